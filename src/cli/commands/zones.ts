import {
  ArmDnsProvider,
  createArmClient,
  createDomainSet,
  findZone,
  type DnsProvider,
  type SitecertConfig,
} from '../../lib/index.js';
import { loadCliConfig, type CommonOptions } from '../utils/config.js';
import { heading, render } from '../logger.js';

export interface ZonesOptions extends CommonOptions {
  domain: string[];
}

export interface ZoneMatch {
  name: string;
  zone: string | undefined;
}

export type DnsProviderFactory = (config: SitecertConfig) => DnsProvider;

const defaultDnsProvider: DnsProviderFactory = (config) => new ArmDnsProvider(createArmClient(config));

/** Print the owning zone of every name; names without one are flagged */
export async function handleZonesCommand(
  options: ZonesOptions,
  dnsFactory: DnsProviderFactory = defaultDnsProvider,
): Promise<ZoneMatch[]> {
  const names = createDomainSet(options.domain);
  const config = await loadCliConfig(options);
  const zones = await dnsFactory(config).listZones();

  const matches = names.map((name) => ({ name, zone: findZone(name.replace(/^\*\./, ''), zones)?.name }));

  heading('Zone matching');
  for (const match of matches) {
    if (match.zone) render.success(`${match.name} -> ${match.zone}`);
    else render.error(`${match.name}: no zone`);
  }
  return matches;
}
