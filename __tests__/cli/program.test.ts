import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';

jest.mock('../../src/cli/commands/issue.js', () => ({
  handleIssueCommand: jest.fn(async () => ({ status: 'completed' })),
}));
jest.mock('../../src/cli/commands/renew.js', () => ({
  handleRenewCommand: jest.fn(async () => []),
}));
jest.mock('../../src/cli/commands/zones.js', () => ({
  handleZonesCommand: jest.fn(async () => []),
}));

import { runCli } from '../../src/cli/program.js';
import { handleIssueCommand } from '../../src/cli/commands/issue.js';
import { handleRenewCommand } from '../../src/cli/commands/renew.js';
import { handleZonesCommand } from '../../src/cli/commands/zones.js';

describe('sitecert CLI', () => {
  const silenced: Array<{ mockRestore(): void }> = [];

  beforeEach(() => {
    process.env.SITECERT_CLI_TEST = '1';
    silenced.push(
      jest.spyOn(process.stdout, 'write').mockImplementation(() => true),
      jest.spyOn(process.stderr, 'write').mockImplementation(() => true),
    );
  });

  afterEach(() => {
    delete process.env.SITECERT_CLI_TEST;
    silenced.splice(0).forEach((spy) => spy.mockRestore());
    jest.clearAllMocks();
  });

  it('shows help without exiting', async () => {
    const program = await runCli(['--help']);
    expect(program.commands.map((c) => c.name())).toEqual(['issue', 'renew', 'zones']);
  });

  it('passes issue options through', async () => {
    await runCli([
      'issue',
      '--site',
      'rg/shop',
      '-d',
      'example.com',
      '-d',
      'www.example.com',
      '--dns01',
      '--endpoint',
      'letsencrypt-staging',
    ]);

    expect(handleIssueCommand).toHaveBeenCalledTimes(1);
    expect(handleIssueCommand).toHaveBeenCalledWith({
      site: 'rg/shop',
      domain: ['example.com', 'www.example.com'],
      dns01: true,
      config: undefined,
      endpoint: 'letsencrypt-staging',
      preferredChain: undefined,
    });
  });

  it('requires a site for issue', async () => {
    await expect(runCli(['issue', '-d', 'example.com'])).rejects.toMatchObject({
      code: 'commander.missingMandatoryOptionValue',
    });
    expect(handleIssueCommand).not.toHaveBeenCalled();
  });

  it('passes the dry-run flag to renew', async () => {
    await runCli(['renew', '--dry-run', '-c', 'sitecert.json']);

    expect(handleRenewCommand).toHaveBeenCalledWith({
      dryRun: true,
      config: 'sitecert.json',
      endpoint: undefined,
      preferredChain: undefined,
    });
  });

  it('collects repeated domains for zones', async () => {
    await runCli(['zones', '-d', 'a.example.com', '--domain', 'b.example.org']);

    expect(handleZonesCommand).toHaveBeenCalledWith({
      domain: ['a.example.com', 'b.example.org'],
      config: undefined,
      endpoint: undefined,
    });
  });
});
