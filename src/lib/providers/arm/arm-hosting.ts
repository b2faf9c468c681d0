import { z } from 'zod';

import type { SiteRef } from '../../types/domain.js';
import type {
  ControlPlaneResult,
  HostedSite,
  HostingCertificate,
  HostingControlPlane,
  ImportCertificateRequest,
  SslState,
} from '../hosting.js';
import { ArmClient, resourceGroupOf } from './arm-client.js';

export const WEB_API_VERSION = '2019-08-01';

const sslStateSchema = z
  .string()
  .transform((value): SslState => {
    const lower = value.toLowerCase();
    if (lower === 'snienabled') return 'SniEnabled';
    if (lower === 'ipbasedenabled') return 'IpBasedEnabled';
    return 'Disabled';
  });

const siteSchema = z.object({
  id: z.string(),
  name: z.string(),
  location: z.string(),
  properties: z.object({
    state: z.string().default('Unknown'),
    serverFarmId: z.string().nullish(),
    hostNames: z.array(z.string()).default([]),
    hostNameSslStates: z
      .array(
        z.object({
          name: z.string(),
          sslState: sslStateSchema,
          thumbprint: z.string().nullish(),
        }),
      )
      .default([]),
  }),
});

const certificateSchema = z.object({
  id: z.string(),
  name: z.string(),
  tags: z.record(z.string()).nullish(),
  properties: z.object({
    thumbprint: z.string(),
    expirationDate: z.coerce.date(),
    hostNames: z.array(z.string()).default([]),
  }),
});

type SiteResource = z.infer<typeof siteSchema>;
type CertificateResource = z.infer<typeof certificateSchema>;

export interface ArmHostingOptions {
  /** Platform suffix of default host names; the SCM host is `<site>.scm<suffix>` */
  appServiceSuffix: string;
}

function toHostedSite(resource: SiteResource): HostedSite {
  // slots are named `<site>/<slot>`
  const [name = resource.name, slot] = resource.name.split('/');
  const { properties } = resource;

  return {
    id: resource.id,
    resourceGroup: resourceGroupOf(resource.id),
    name,
    ...(slot ? { slot } : {}),
    state: properties.state,
    location: resource.location,
    serverFarmId: properties.serverFarmId ?? undefined,
    hostNames: properties.hostNames,
    hostNameSslStates: properties.hostNameSslStates.map((s) => ({
      name: s.name,
      sslState: s.sslState,
      thumbprint: s.thumbprint ?? undefined,
    })),
  };
}

function toHostingCertificate(resource: CertificateResource): HostingCertificate {
  return {
    id: resource.id,
    name: resource.name,
    resourceGroup: resourceGroupOf(resource.id),
    thumbprint: resource.properties.thumbprint.toUpperCase(),
    expiresOn: resource.properties.expirationDate,
    hostNames: resource.properties.hostNames,
    tags: resource.tags ?? {},
  };
}

/**
 * App hosting over the resource manager REST API; challenge files go through
 * the site's SCM virtual file system
 */
export class ArmHostingControlPlane implements HostingControlPlane {
  constructor(
    private readonly arm: ArmClient,
    private readonly opts: ArmHostingOptions,
  ) {}

  sitePath(site: SiteRef): string {
    const base = `${this.arm.subscriptionPath}/resourceGroups/${site.resourceGroup}/providers/Microsoft.Web/sites/${site.name}`;
    return site.slot ? `${base}/slots/${site.slot}` : base;
  }

  certificatePath(resourceGroup: string, name: string): string {
    return `${this.arm.subscriptionPath}/resourceGroups/${resourceGroup}/providers/Microsoft.Web/certificates/${name}`;
  }

  /** `https://<site>[-<slot>].scm<suffix>/api/vfs/site/wwwroot/<path>` */
  vfsUrl(site: SiteRef, path: string): string {
    const host = site.slot ? `${site.name}-${site.slot}` : site.name;
    const cleanPath = path.replace(/^\/+/, '');
    return `https://${host}.scm${this.opts.appServiceSuffix}/api/vfs/site/wwwroot/${cleanPath}`;
  }

  async listSites(): Promise<HostedSite[]> {
    const sites = await this.arm.list(`${this.arm.subscriptionPath}/providers/Microsoft.Web/sites`, WEB_API_VERSION, siteSchema);
    const result: HostedSite[] = [];

    for (const site of sites) {
      result.push(toHostedSite(site));
      const slots = await this.arm.list(`${site.id}/slots`, WEB_API_VERSION, siteSchema);
      result.push(...slots.map(toHostedSite));
    }

    return result;
  }

  async getSite(site: SiteRef): Promise<HostedSite | undefined> {
    const resource = await this.arm.get(this.sitePath(site), WEB_API_VERSION, siteSchema);
    return resource && toHostedSite(resource);
  }

  async listCertificates(): Promise<HostingCertificate[]> {
    const certificates = await this.arm.list(
      `${this.arm.subscriptionPath}/providers/Microsoft.Web/certificates`,
      WEB_API_VERSION,
      certificateSchema,
    );
    return certificates.map(toHostingCertificate);
  }

  async getCertificate(site: SiteRef, name: string): Promise<HostingCertificate | undefined> {
    const resource = await this.arm.get(this.certificatePath(site.resourceGroup, name), WEB_API_VERSION, certificateSchema);
    return resource && toHostingCertificate(resource);
  }

  importCertificate(request: ImportCertificateRequest): Promise<ControlPlaneResult> {
    const { site } = request;
    return this.arm.put(this.certificatePath(site.resourceGroup, request.name), WEB_API_VERSION, {
      location: site.location,
      tags: request.tags,
      properties: {
        pfxBlob: request.pfx.toString('base64'),
        password: request.passphrase,
        ...(site.serverFarmId ? { serverFarmId: site.serverFarmId } : {}),
      },
    });
  }

  updateHostNameBinding(site: HostedSite, hostName: string, thumbprint: string): Promise<ControlPlaneResult> {
    return this.arm.put(`${this.sitePath(site)}/hostNameBindings/${hostName}`, WEB_API_VERSION, {
      properties: { sslState: 'SniEnabled', thumbprint },
    });
  }

  deleteCertificate(certificate: HostingCertificate): Promise<ControlPlaneResult> {
    return this.arm.delete(certificate.id, WEB_API_VERSION);
  }

  writeFile(site: SiteRef, path: string, content: string): Promise<ControlPlaneResult> {
    return this.arm.send('PUT', this.vfsUrl(site, path), content, {
      'Content-Type': 'application/octet-stream',
      'If-Match': '*',
    });
  }

  deleteFile(site: SiteRef, path: string): Promise<ControlPlaneResult> {
    return this.arm.send('DELETE', this.vfsUrl(site, path), undefined, { 'If-Match': '*' });
  }
}
