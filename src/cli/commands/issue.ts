import {
  CHALLENGE_TYPE,
  createIssuanceJob,
  createRuntime,
  parseSiteRef,
  InvalidDomainSetError,
  type IssuanceResult,
  type Runtime,
  type SitecertConfig,
} from '../../lib/index.js';
import { loadCliConfig, type CommonOptions } from '../utils/config.js';
import { createSpinner, heading, kv, renderResult } from '../logger.js';

export interface IssueOptions extends CommonOptions {
  site: string;
  domain: string[];
  dns01?: boolean;
}

export type RuntimeFactory = (config: SitecertConfig) => Promise<Runtime>;

/** Issue and deploy one certificate for a site */
export async function handleIssueCommand(
  options: IssueOptions,
  runtimeFactory: RuntimeFactory = createRuntime,
): Promise<IssuanceResult> {
  const site = parseSiteRef(options.site);
  if (!site) {
    throw new InvalidDomainSetError(`Invalid site "${options.site}", expected <resourceGroup>/<name>[/<slot>]`);
  }

  const job = createIssuanceJob(site, options.domain, {
    ...(options.dns01 ? { challengeType: CHALLENGE_TYPE.DNS_01 } : {}),
  });

  const config = await loadCliConfig(options);
  heading('Issue certificate');
  kv('site', options.site);
  kv('names', job.dnsNames.join(', '));
  kv('challenge', job.challengeType);
  kv('endpoint', config.endpoint);

  const runtime = await runtimeFactory(config);
  const spinner = createSpinner().start(`Running ${job.challengeType} workflow`);
  const result = await runtime.orchestrator.run(job);

  if (result.status === 'completed') spinner.succeed('Done');
  else spinner.fail('Workflow failed');
  renderResult(result);

  return result;
}
