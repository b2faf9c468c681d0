import type { SiteRef } from '../types/domain.js';

export type SslState = 'Disabled' | 'SniEnabled' | 'IpBasedEnabled';

export interface HostNameSslState {
  name: string;
  sslState: SslState;
  thumbprint?: string | undefined;
}

export interface HostedSite extends SiteRef {
  id: string;
  /** `Running`, `Stopped`, ... */
  state: string;
  location: string;
  serverFarmId?: string | undefined;
  hostNames: string[];
  hostNameSslStates: HostNameSslState[];
}

export interface HostingCertificate {
  id: string;
  name: string;
  resourceGroup: string;
  thumbprint: string;
  expiresOn: Date;
  hostNames: string[];
  tags: Record<string, string>;
}

export interface ImportCertificateRequest {
  site: HostedSite;
  name: string;
  pfx: Buffer;
  passphrase: string;
  tags: Record<string, string>;
}

/** Outcome of a mutating control-plane call */
export interface ControlPlaneResult {
  statusCode: number;
  /** Request target, for error reports */
  target: string;
  payloadSize: number;
  /** Response body excerpt on failure */
  detail?: string | undefined;
}

/**
 * Hosting layer the certificates are deployed to
 */
export interface HostingControlPlane {
  listSites(): Promise<HostedSite[]>;
  getSite(site: SiteRef): Promise<HostedSite | undefined>;
  listCertificates(): Promise<HostingCertificate[]>;
  getCertificate(site: SiteRef, name: string): Promise<HostingCertificate | undefined>;
  importCertificate(request: ImportCertificateRequest): Promise<ControlPlaneResult>;
  updateHostNameBinding(site: HostedSite, hostName: string, thumbprint: string): Promise<ControlPlaneResult>;
  deleteCertificate(certificate: HostingCertificate): Promise<ControlPlaneResult>;
  /** Write a file below the site's web root */
  writeFile(site: SiteRef, path: string, content: string): Promise<ControlPlaneResult>;
  /** Remove a file written with `writeFile`; missing files are not an error */
  deleteFile(site: SiteRef, path: string): Promise<ControlPlaneResult>;
}

export function isSuccess(result: ControlPlaneResult): boolean {
  return result.statusCode >= 200 && result.statusCode < 300;
}
