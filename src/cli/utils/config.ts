import { loadConfig, parseConfig, type SitecertConfig } from '../../lib/index.js';

/** Options shared by every command */
export interface CommonOptions {
  config?: string;
  endpoint?: string;
  preferredChain?: string;
}

/** Config file and environment, then command-line overrides */
export async function loadCliConfig(opts: CommonOptions, env: NodeJS.ProcessEnv = process.env): Promise<SitecertConfig> {
  const base = await loadConfig({ file: opts.config, env });
  if (opts.endpoint === undefined && opts.preferredChain === undefined) {
    return base;
  }

  // re-validate so an endpoint preset given on the command line is resolved
  const { cloud: _cloud, ...raw } = base;
  return parseConfig({
    ...raw,
    ...(opts.endpoint !== undefined ? { endpoint: opts.endpoint } : {}),
    ...(opts.preferredChain !== undefined ? { preferredChain: opts.preferredChain } : {}),
  });
}
