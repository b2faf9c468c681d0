import { NameServerMismatchError, ZoneNotFoundError } from '../errors/workflow-errors.js';
import type { Zone } from '../types/domain.js';
import { debugDns } from '../utils/debug.js';
import type { LiveDnsResolver } from './resolver.js';

function normalize(name: string): string {
  return name.trim().replace(/\.+$/, '').toLowerCase();
}

/**
 * Most specific zone owning `name`: the longest zone name equal to `name` or
 * a dot-suffix of it. Ties keep input order.
 */
export function findZone(name: string, zones: readonly Zone[]): Zone | undefined {
  const target = normalize(name);
  let best: Zone | undefined;
  let bestLength = -1;

  for (const zone of zones) {
    const zoneName = normalize(zone.name);
    const owns = target === zoneName || target.endsWith(`.${zoneName}`);
    if (owns && zoneName.length > bestLength) {
      best = zone;
      bestLength = zoneName.length;
    }
  }

  return best;
}

/**
 * Owning zone for every name. Throws one ZoneNotFoundError listing all
 * unmatched names.
 */
export function matchZones(names: readonly string[], zones: readonly Zone[]): Map<string, Zone> {
  const matched = new Map<string, Zone>();
  const missing: string[] = [];

  for (const name of names) {
    const zone = findZone(name, zones);
    if (zone) {
      matched.set(name, zone);
    } else {
      missing.push(name);
    }
  }

  if (missing.length > 0) {
    throw ZoneNotFoundError.forNames(missing);
  }

  return matched;
}

/**
 * Check that each zone's live NS records overlap the name servers the DNS
 * provider expects. Zones without known name servers are skipped.
 */
export async function verifyDelegation(zones: Iterable<Zone>, resolver: LiveDnsResolver): Promise<void> {
  const seen = new Set<string>();

  for (const zone of zones) {
    if (seen.has(zone.id) || zone.nameServers.length === 0) continue;
    seen.add(zone.id);

    const expected = zone.nameServers.map(normalize);
    const actual = (await resolver.resolveNs(zone.name)).map(normalize);
    debugDns('zone %s expected NS=%j actual NS=%j', zone.name, expected, actual);

    if (!actual.some((ns) => expected.includes(ns))) {
      throw new NameServerMismatchError(zone.name, expected, actual);
    }
  }
}
