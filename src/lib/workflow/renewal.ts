import type { HostedSite, HostingCertificate, HostingControlPlane } from '../providers/hosting.js';
import { toSiteRef, type IssuanceJob } from '../types/domain.js';
import { CHALLENGE_TYPE, type AcmeChallengeType } from '../types/status.js';
import { isOwnCertificate } from '../core/deployer.js';
import { debugWorkflow } from '../utils/debug.js';
import { createIssuanceJob } from './job.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface RenewalOptions {
  /** ACME directory URL the certificates were issued against */
  endpoint: string;
  renewBeforeExpiryDays: number;
}

export interface SiteFilterOptions {
  runningOnly?: boolean;
  /** Platform DNS suffixes, e.g. `.azurewebsites.net`; host names under them are not custom */
  dnsSuffixes: readonly string[];
}

function underSuffix(hostName: string, suffixes: readonly string[]): boolean {
  const name = hostName.toLowerCase();
  return suffixes.some((s) => {
    const suffix = s.toLowerCase().replace(/^\.+/, '');
    return name === suffix || name.endsWith(`.${suffix}`);
  });
}

/** Host names of `site` outside the platform suffixes */
export function customHostNames(site: HostedSite, dnsSuffixes: readonly string[]): string[] {
  return site.hostNames.filter((h) => !underSuffix(h, dnsSuffixes));
}

/**
 * Certificates issued by this tool for `endpoint` that expire within the
 * renewal window, soonest first
 */
export async function findExpiringCertificates(
  hosting: HostingControlPlane,
  now: Date,
  opts: RenewalOptions,
): Promise<HostingCertificate[]> {
  const cutoff = now.getTime() + opts.renewBeforeExpiryDays * DAY_MS;
  const expiring = (await hosting.listCertificates())
    .filter((cert) => isOwnCertificate(cert, opts.endpoint) && cert.expiresOn.getTime() <= cutoff)
    .sort((a, b) => a.expiresOn.getTime() - b.expiresOn.getTime());

  debugWorkflow('%d certificate(s) expire before %s', expiring.length, new Date(cutoff).toISOString());
  return expiring;
}

/** Sites with at least one custom host name, sorted by name */
export async function listCustomDomainSites(
  hosting: HostingControlPlane,
  opts: SiteFilterOptions,
): Promise<HostedSite[]> {
  const sites = await hosting.listSites();
  return sites
    .filter((site) => !opts.runningOnly || site.state === 'Running')
    .filter((site) => customHostNames(site, opts.dnsSuffixes).length > 0)
    .sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * One job per expiring certificate and site binding it: the certificate's
 * host names the site still serves. Certificates covering a wildcard are
 * renewed with DNS-01, the rest with `challengeType`.
 */
export function planRenewals(
  certificates: readonly HostingCertificate[],
  sites: readonly HostedSite[],
  challengeType: AcmeChallengeType = CHALLENGE_TYPE.HTTP_01,
): IssuanceJob[] {
  const jobs: IssuanceJob[] = [];
  const seen = new Set<string>();

  for (const cert of certificates) {
    const thumbprint = cert.thumbprint.toUpperCase();

    for (const site of sites) {
      const bound = site.hostNameSslStates.some((s) => s.thumbprint?.toUpperCase() === thumbprint);
      if (!bound) continue;

      const served = new Set(site.hostNames.map((h) => h.toLowerCase()));
      const names = cert.hostNames.filter((h) => served.has(h.toLowerCase()) || h.startsWith('*.'));
      if (names.length === 0) continue;

      const type = names.some((n) => n.startsWith('*.')) ? CHALLENGE_TYPE.DNS_01 : challengeType;
      const job = createIssuanceJob(toSiteRef(site), names, { challengeType: type });
      if (seen.has(job.id)) continue;

      seen.add(job.id);
      jobs.push(job);
    }
  }

  return jobs;
}
