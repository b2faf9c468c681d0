import { Command } from 'commander';
import { readFileSync } from 'fs';
import { join } from 'path';
import { handleError } from './utils/errors.js';
import { handleIssueCommand } from './commands/issue.js';
import { handleRenewCommand } from './commands/renew.js';
import { handleZonesCommand } from './commands/zones.js';

function packageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf-8'));
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/** Build a Commander program instance for the sitecert CLI. */
export function createCli(): Command {
  const program = new Command();

  program
    .name('sitecert')
    .description('ACME certificates for hosted sites with custom domains')
    .version(packageVersion());

  // In test mode override default exit (help, errors) to throw instead of process.exit
  if (process.env.SITECERT_CLI_TEST) {
    program.exitOverride();
  }

  function exitOnError() {
    if (process.env.SITECERT_CLI_TEST) return;
    process.exitCode = 1;
  }

  const common = (cmd: Command) =>
    cmd
      .option('-c, --config <file>', 'JSON configuration file')
      .option('--endpoint <nameOrUrl>', 'ACME directory preset or URL')
      .option('--preferred-chain <issuer>', 'Issuer CN of the preferred chain');

  common(
    program
      .command('issue')
      .description('Issue a certificate for a site and bind it')
      .requiredOption('-s, --site <rg/name[/slot]>', 'Target site')
      .requiredOption('-d, --domain <name>', 'DNS name (repeatable)', collect)
      .option('--dns01', 'Validate with dns-01 instead of http-01'),
  ).action(async (opts) => {
    try {
      const result = await handleIssueCommand({
        site: opts.site,
        domain: opts.domain,
        dns01: opts.dns01,
        config: opts.config,
        endpoint: opts.endpoint,
        preferredChain: opts.preferredChain,
      });
      if (result.status !== 'completed') exitOnError();
    } catch (e) {
      handleError(e);
      exitOnError();
    }
  });

  common(
    program
      .command('renew')
      .description('Renew certificates close to expiry')
      .option('--dry-run', 'List the renewals without issuing'),
  ).action(async (opts) => {
    try {
      const results = await handleRenewCommand({
        dryRun: opts.dryRun,
        config: opts.config,
        endpoint: opts.endpoint,
        preferredChain: opts.preferredChain,
      });
      if (results.some((r) => r.status !== 'completed')) exitOnError();
    } catch (e) {
      handleError(e);
      exitOnError();
    }
  });

  common(
    program
      .command('zones')
      .description('Show the DNS zone owning each name')
      .requiredOption('-d, --domain <name>', 'DNS name (repeatable)', collect),
  ).action(async (opts) => {
    try {
      await handleZonesCommand({ domain: opts.domain, config: opts.config, endpoint: opts.endpoint });
    } catch (e) {
      handleError(e);
      exitOnError();
    }
  });

  return program;
}

/** For tests: parse arguments and return the program (no automatic exit). */
export async function runCli(argv: string[]): Promise<Command> {
  const program = createCli();
  try {
    await program.parseAsync(argv, { from: 'user' });
  } catch (err: unknown) {
    const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
    if (code !== 'commander.helpDisplayed' && code !== 'commander.version') {
      throw err;
    }
  }
  return program;
}
