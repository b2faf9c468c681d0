import { InvalidDomainSetError } from '../errors/workflow-errors.js';
import { CHALLENGE_TYPE, type AcmeChallengeType } from '../types/status.js';
import { siteKey, type IssuanceJob, type SiteRef } from '../types/domain.js';

const LABEL = /^(\*|[a-z0-9_]([a-z0-9_-]{0,61}[a-z0-9_])?)$/;

/** Lowercase, trim, drop a trailing root dot */
export function normalizeDnsName(name: string): string {
  return name.trim().toLowerCase().replace(/\.$/, '');
}

function isValidDnsName(name: string): boolean {
  if (name.length === 0 || name.length > 253) return false;
  const labels = name.split('.');
  if (labels.length < 2) return false;
  return labels.every((label, i) => LABEL.test(label) && (label !== '*' || i === 0));
}

/**
 * Ordered, case-insensitively deduplicated list of DNS names; first occurrence wins
 */
export function createDomainSet(names: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];

  for (const raw of names) {
    const name = normalizeDnsName(raw);
    if (!isValidDnsName(name)) {
      throw new InvalidDomainSetError(`Invalid DNS name: "${raw}"`, { name: raw });
    }
    if (!seen.has(name)) {
      seen.add(name);
      result.push(name);
    }
  }

  if (result.length === 0) {
    throw new InvalidDomainSetError('A certificate needs at least one DNS name');
  }

  return result;
}

export interface CreateIssuanceJobOptions {
  /** Forced challenge type; wildcard names always use dns-01 */
  challengeType?: AcmeChallengeType;
}

export function createIssuanceJob(
  site: SiteRef,
  names: Iterable<string>,
  opts: CreateIssuanceJobOptions = {},
): IssuanceJob {
  const dnsNames = createDomainSet(names);
  const hasWildcard = dnsNames.some((n) => n.startsWith('*.'));

  if (hasWildcard && opts.challengeType === CHALLENGE_TYPE.HTTP_01) {
    throw new InvalidDomainSetError('Wildcard names can only be validated with dns-01', { dnsNames });
  }

  const challengeType = opts.challengeType ?? (hasWildcard ? CHALLENGE_TYPE.DNS_01 : CHALLENGE_TYPE.HTTP_01);

  return {
    id: `${siteKey(site)}:${dnsNames.join(',')}`,
    site,
    dnsNames,
    challengeType,
  };
}
