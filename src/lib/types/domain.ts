/**
 * Workflow domain types
 */

import type { AcmeChallengeType } from './status.js';

/** DNS zone as listed by the DNS provider, refreshed once per run */
export interface Zone {
  /** Provider resource id */
  id: string;
  /** Zone apex, e.g. `example.com` */
  name: string;
  /** Delegated name servers; empty when the provider does not know them */
  nameServers: string[];
}

export interface HttpProof {
  kind: 'http-01';
  /** URL the CA fetches */
  url: string;
  /** Site-relative path, `.well-known/acme-challenge/<token>` */
  path: string;
  /** Key authorization */
  value: string;
}

export interface DnsProof {
  kind: 'dns-01';
  /** `_acme-challenge.<name>` */
  recordName: string;
  /** base64url(SHA-256(key authorization)) */
  value: string;
}

export type ChallengeProof = HttpProof | DnsProof;

/** One answered authorization: where to tell the CA, and what it will look for */
export interface ChallengeResult {
  challengeUrl: string;
  proof: ChallengeProof;
}

/** Hosted site a certificate is bound to */
export interface SiteRef {
  resourceGroup: string;
  name: string;
  slot?: string | undefined;
}

export interface IssuedCertificate {
  /** PKCS#12 bundle (leaf + chain + private key) */
  pfx: Buffer;
  /** Transport passphrase of `pfx`; never persisted */
  passphrase: string;
  /** Uppercase SHA-1 hex of the leaf DER */
  thumbprint: string;
  expiresOn: Date;
  dnsNames: string[];
}

/**
 * One certificate request: a deduplicated domain set for a single site,
 * answered with a single challenge type
 */
export interface IssuanceJob {
  /** Stable key for checkpoints and batch results */
  id: string;
  site: SiteRef;
  dnsNames: string[];
  challengeType: AcmeChallengeType;
}

export function siteKey(site: SiteRef): string {
  return site.slot ? `${site.resourceGroup}/${site.name}/${site.slot}` : `${site.resourceGroup}/${site.name}`;
}

/** `rg/name` or `rg/name/slot` */
export function parseSiteRef(value: string): SiteRef | undefined {
  const parts = value.split('/').filter((p) => p.length > 0);
  const [resourceGroup, name, slot] = parts;
  if (parts.length < 2 || parts.length > 3 || !resourceGroup || !name) {
    return undefined;
  }
  return slot ? { resourceGroup, name, slot } : { resourceGroup, name };
}

/** Plain reference, dropping any extra fields of a richer site object */
export function toSiteRef(site: SiteRef): SiteRef {
  const { resourceGroup, name, slot } = site;
  return slot ? { resourceGroup, name, slot } : { resourceGroup, name };
}
