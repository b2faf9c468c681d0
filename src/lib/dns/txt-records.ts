import type { DnsProvider } from '../providers/dns-provider.js';
import type { DnsProof, Zone } from '../types/domain.js';
import { ZoneNotFoundError } from '../errors/workflow-errors.js';
import { debugDns } from '../utils/debug.js';
import { findZone } from './zone-matcher.js';

export const ACME_CHALLENGE_TTL = 60;

export interface TxtRecordGroup {
  /** Record name as first seen, lowercased */
  recordName: string;
  zone: Zone;
  /** Record name relative to the zone (`_acme-challenge.www`) */
  label: string;
  /** Distinct values, sorted */
  values: string[];
}

/** Record name relative to `zoneName`; `@` for the apex */
export function relativeLabel(recordName: string, zoneName: string): string {
  const name = recordName.toLowerCase().replace(/\.$/, '');
  const zone = zoneName.toLowerCase().replace(/\.$/, '');
  if (name === zone) return '@';
  return name.endsWith(`.${zone}`) ? name.slice(0, -(zone.length + 1)) : name;
}

/**
 * Group DNS proofs by record name (case-insensitive) and resolve each group's
 * zone. Throws ZoneNotFoundError listing every record name without a zone.
 */
export function groupDnsProofs(proofs: readonly DnsProof[], zones: readonly Zone[]): TxtRecordGroup[] {
  const byName = new Map<string, Set<string>>();
  for (const proof of proofs) {
    const key = proof.recordName.toLowerCase();
    const values = byName.get(key) ?? new Set<string>();
    values.add(proof.value);
    byName.set(key, values);
  }

  const groups: TxtRecordGroup[] = [];
  const missing: string[] = [];

  for (const [recordName, values] of byName) {
    const zone = findZone(recordName, zones);
    if (!zone) {
      missing.push(recordName);
      continue;
    }
    groups.push({
      recordName,
      zone,
      label: relativeLabel(recordName, zone.name),
      values: [...values].sort(),
    });
  }

  if (missing.length > 0) {
    throw ZoneNotFoundError.forNames(missing);
  }

  return groups;
}

/**
 * Replace each group's TXT record set with exactly its values at TTL 60.
 * Re-running with the same proofs leaves the same record sets.
 */
export async function upsertChallengeRecords(
  provider: DnsProvider,
  proofs: readonly DnsProof[],
  zones: readonly Zone[],
): Promise<TxtRecordGroup[]> {
  const groups = groupDnsProofs(proofs, zones);

  for (const group of groups) {
    const existing = await provider.getTxtRecordSet(group.zone, group.label);
    debugDns(
      'upsert TXT %s in %s: %j (previous %j)',
      group.label,
      group.zone.name,
      group.values,
      existing?.values ?? [],
    );
    await provider.upsertTxtRecordSet(group.zone, group.label, {
      ttl: ACME_CHALLENGE_TTL,
      values: group.values,
    });
  }

  return groups;
}

/** Delete the TXT record set of every group; missing sets are fine */
export async function deleteChallengeRecords(
  provider: DnsProvider,
  proofs: readonly DnsProof[],
  zones: readonly Zone[],
): Promise<void> {
  for (const group of groupDnsProofs(proofs, zones)) {
    debugDns('delete TXT %s in %s', group.label, group.zone.name);
    await provider.deleteTxtRecordSet(group.zone, group.label);
  }
}
