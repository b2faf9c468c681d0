import type { HostedSite, HostingCertificate, HostingControlPlane } from '../providers/hosting.js';
import { isSuccess } from '../providers/hosting.js';
import type { IssuedCertificate, SiteRef } from '../types/domain.js';
import { DeploymentError } from '../errors/workflow-errors.js';
import { debugDeploy } from '../utils/debug.js';
import { logWarn } from '../utils/logger.js';
import { errorMessage } from '../utils/index.js';

/** Tag value marking certificates this tool issued */
export const ISSUER_TAG_VALUE = 'sitecert';

export interface DeployerOptions {
  /** ACME directory URL; its host is recorded in the `Endpoint` tag */
  endpoint: string;
}

export interface UploadResult {
  name: string;
  /** false when an identical certificate was already present */
  imported: boolean;
}

/** `<dnsName>-<thumbprint>`; a wildcard label becomes `wildcard` */
export function certificateName(dnsName: string, thumbprint: string): string {
  return `${dnsName.replace(/^\*\./, 'wildcard.')}-${thumbprint}`;
}

export function issuerTags(endpoint: string): Record<string, string> {
  return { Issuer: ISSUER_TAG_VALUE, Endpoint: new URL(endpoint).host };
}

/** Certificate was issued by this tool against `endpoint` */
export function isOwnCertificate(cert: HostingCertificate, endpoint: string): boolean {
  const tags = issuerTags(endpoint);
  return cert.tags['Issuer'] === tags['Issuer'] && cert.tags['Endpoint'] === tags['Endpoint'];
}

function sameNames(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a.map((n) => n.toLowerCase()));
  const right = new Set(b.map((n) => n.toLowerCase()));
  return left.size === right.size && [...left].every((n) => right.has(n));
}

export class Deployer {
  constructor(
    private readonly hosting: HostingControlPlane,
    private readonly opts: DeployerOptions,
  ) {}

  /**
   * Import the bundle under its deterministic name. An existing certificate
   * with the same name and thumbprint is left as is.
   */
  async upload(site: HostedSite, certificate: IssuedCertificate): Promise<UploadResult> {
    const [firstName] = certificate.dnsNames;
    if (firstName === undefined) {
      throw new DeploymentError('importCertificate', site.name, 400, certificate.pfx.length, 'No DNS names');
    }

    const name = certificateName(firstName, certificate.thumbprint);
    const existing = await this.hosting.getCertificate(site, name);
    if (existing && existing.thumbprint.toUpperCase() === certificate.thumbprint) {
      debugDeploy('certificate %s already present, skipping import', name);
      return { name, imported: false };
    }

    const result = await this.hosting.importCertificate({
      site,
      name,
      pfx: certificate.pfx,
      passphrase: certificate.passphrase,
      tags: issuerTags(this.opts.endpoint),
    });

    if (!isSuccess(result)) {
      throw new DeploymentError('importCertificate', result.target, result.statusCode, result.payloadSize, result.detail);
    }

    debugDeploy('imported %s (%d bytes) status=%d', name, result.payloadSize, result.statusCode);
    return { name, imported: true };
  }

  /**
   * SNI binding to `thumbprint` for every site host name in `dnsNames`.
   * Bindings already pointing at the thumbprint are not rewritten.
   * Returns the host names that were updated.
   */
  async bind(site: HostedSite, dnsNames: readonly string[], thumbprint: string): Promise<string[]> {
    const wanted = new Set(dnsNames.map((n) => n.toLowerCase()));
    const updated: string[] = [];

    for (const state of site.hostNameSslStates) {
      if (!wanted.has(state.name.toLowerCase())) continue;

      if (state.sslState === 'SniEnabled' && state.thumbprint?.toUpperCase() === thumbprint) {
        debugDeploy('%s already bound to %s', state.name, thumbprint);
        continue;
      }

      const result = await this.hosting.updateHostNameBinding(site, state.name, thumbprint);
      if (!isSuccess(result)) {
        throw new DeploymentError(
          'updateHostNameBinding',
          result.target,
          result.statusCode,
          result.payloadSize,
          result.detail,
        );
      }

      debugDeploy('bound %s to %s', state.name, thumbprint);
      updated.push(state.name);
    }

    return updated;
  }

  /**
   * Delete certificates this tool issued earlier for the same names that no
   * host name binding on the site still uses. Failures are logged.
   */
  async removeStaleCertificates(site: SiteRef, dnsNames: readonly string[], thumbprint: string): Promise<string[]> {
    const removed: string[] = [];

    try {
      const current = await this.hosting.getSite(site);
      const inUse = new Set(
        (current?.hostNameSslStates ?? []).flatMap((s) => (s.thumbprint ? [s.thumbprint.toUpperCase()] : [])),
      );

      const stale = (await this.hosting.listCertificates()).filter(
        (cert) =>
          isOwnCertificate(cert, this.opts.endpoint) &&
          cert.resourceGroup.toLowerCase() === site.resourceGroup.toLowerCase() &&
          cert.thumbprint.toUpperCase() !== thumbprint &&
          !inUse.has(cert.thumbprint.toUpperCase()) &&
          sameNames(cert.hostNames, dnsNames),
      );

      for (const cert of stale) {
        const result = await this.hosting.deleteCertificate(cert);
        if (isSuccess(result)) {
          debugDeploy('deleted stale certificate %s', cert.name);
          removed.push(cert.name);
        } else {
          logWarn(`Could not delete certificate ${cert.name}: status ${result.statusCode}`);
        }
      }
    } catch (err) {
      logWarn(`Stale certificate cleanup failed: ${errorMessage(err)}`);
    }

    return removed;
  }
}
