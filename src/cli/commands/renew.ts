import {
  createRuntime,
  findExpiringCertificates,
  listCustomDomainSites,
  planRenewals,
  siteKey,
  type IssuanceResult,
} from '../../lib/index.js';
import { loadCliConfig, type CommonOptions } from '../utils/config.js';
import { heading, kv, render, renderResult } from '../logger.js';
import type { RuntimeFactory } from './issue.js';

export interface RenewOptions extends CommonOptions {
  dryRun?: boolean;
}

/** Renew every certificate this tool issued that is close to expiry */
export async function handleRenewCommand(
  options: RenewOptions,
  runtimeFactory: RuntimeFactory = createRuntime,
  now: Date = new Date(),
): Promise<IssuanceResult[]> {
  const config = await loadCliConfig(options);
  const runtime = await runtimeFactory(config);
  const { hosting } = runtime.deps;

  const expiring = await findExpiringCertificates(hosting, now, {
    endpoint: config.endpoint,
    renewBeforeExpiryDays: config.renewBeforeExpiryDays,
  });

  heading('Renewal');
  kv('expiring', String(expiring.length));
  if (expiring.length === 0) {
    render.info(`No certificate expires within ${config.renewBeforeExpiryDays} days`);
    return [];
  }

  const sites = await listCustomDomainSites(hosting, {
    runningOnly: true,
    dnsSuffixes: [config.dnsSuffixes.appService, config.dnsSuffixes.trafficManager],
  });
  const jobs = planRenewals(expiring, sites);
  render.list(jobs.map((job) => `${siteKey(job.site)}: ${job.dnsNames.join(', ')} (${job.challengeType})`));

  if (options.dryRun) {
    render.info('Dry run, nothing issued');
    return [];
  }

  const results = await runtime.orchestrator.runBatch(jobs);
  results.forEach(renderResult);
  return results;
}
