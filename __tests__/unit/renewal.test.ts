import { describe, it, expect } from '@jest/globals';

import {
  customHostNames,
  findExpiringCertificates,
  listCustomDomainSites,
  planRenewals,
} from '../../src/lib/workflow/renewal.js';
import { issuerTags } from '../../src/lib/core/deployer.js';
import type { HostNameSslState, HostedSite, HostingCertificate } from '../../src/lib/providers/hosting.js';
import { FakeHosting, hostedSite } from '../utils/fakes.js';

const ENDPOINT = 'https://acme.test/directory';
const NOW = new Date('2026-03-01T00:00:00Z');
const SUFFIXES = ['.azurewebsites.net', '.trafficmanager.net'];

function cert(name: string, expiresOn: string, hostNames: string[], own = true): HostingCertificate {
  return {
    id: `/certificates/${name}`,
    name,
    resourceGroup: 'rg',
    thumbprint: name.toUpperCase(),
    expiresOn: new Date(expiresOn),
    hostNames,
    tags: own ? issuerTags(ENDPOINT) : {},
  };
}

function boundTo(site: HostedSite, hostName: string, thumbprint: string): HostedSite {
  return {
    ...site,
    hostNameSslStates: site.hostNameSslStates.map((s): HostNameSslState =>
      s.name === hostName ? { ...s, sslState: 'SniEnabled', thumbprint } : s,
    ),
  };
}

describe('customHostNames', () => {
  it('drops platform host names', () => {
    const site = hostedSite('shop', ['www.example.com', 'shop.trafficmanager.net', 'Shop.AzureWebsites.NET']);
    expect(customHostNames(site, SUFFIXES)).toEqual(['www.example.com']);
  });
});

describe('findExpiringCertificates', () => {
  it('keeps own certificates inside the window, soonest first', async () => {
    const hosting = new FakeHosting();
    hosting.certificates.push(
      cert('later', '2026-03-25T00:00:00Z', ['b.example.com']),
      cert('far', '2026-05-01T00:00:00Z', ['c.example.com']),
      cert('soon', '2026-03-05T00:00:00Z', ['a.example.com']),
      cert('foreign', '2026-03-02T00:00:00Z', ['d.example.com'], false),
      cert('expired', '2026-02-20T00:00:00Z', ['e.example.com']),
    );

    const expiring = await findExpiringCertificates(hosting, NOW, { endpoint: ENDPOINT, renewBeforeExpiryDays: 30 });

    expect(expiring.map((c) => c.name)).toEqual(['expired', 'soon', 'later']);
  });
});

describe('listCustomDomainSites', () => {
  const sites = [
    hostedSite('zeta', ['zeta.example.com']),
    hostedSite('alpha', ['alpha.example.com'], { state: 'Stopped' }),
    hostedSite('plain', []),
  ];

  it('lists sites with custom host names by name', async () => {
    const result = await listCustomDomainSites(new FakeHosting(sites), { dnsSuffixes: SUFFIXES });
    expect(result.map((s) => s.name)).toEqual(['alpha', 'zeta']);
  });

  it('can leave out stopped sites', async () => {
    const result = await listCustomDomainSites(new FakeHosting(sites), { dnsSuffixes: SUFFIXES, runningOnly: true });
    expect(result.map((s) => s.name)).toEqual(['zeta']);
  });
});

describe('planRenewals', () => {
  it('plans one job per bound site with the names it still serves', () => {
    const expiring = cert('abc', '2026-03-05T00:00:00Z', ['example.com', 'www.example.com', 'gone.example.com']);
    const shop = boundTo(hostedSite('shop', ['example.com', 'www.example.com']), 'www.example.com', 'ABC');
    const other = hostedSite('other', ['example.com']);

    const jobs = planRenewals([expiring], [shop, other]);

    expect(jobs).toEqual([
      {
        id: 'rg/shop:example.com,www.example.com',
        site: { resourceGroup: 'rg', name: 'shop' },
        dnsNames: ['example.com', 'www.example.com'],
        challengeType: 'http-01',
      },
    ]);
  });

  it('renews wildcard certificates with dns-01', () => {
    const expiring = cert('wild', '2026-03-05T00:00:00Z', ['*.example.com', 'example.com']);
    const shop = boundTo(hostedSite('shop', ['example.com']), 'example.com', 'WILD');

    const [job] = planRenewals([expiring], [shop]);

    expect(job?.dnsNames).toEqual(['*.example.com', 'example.com']);
    expect(job?.challengeType).toBe('dns-01');
  });

  it('keeps the slot and drops duplicate jobs', () => {
    const expiring = cert('abc', '2026-03-05T00:00:00Z', ['www.example.com']);
    const slot = boundTo(
      hostedSite('shop', ['www.example.com'], { slot: 'staging' }),
      'www.example.com',
      'ABC',
    );

    const jobs = planRenewals([expiring, expiring], [slot]);

    expect(jobs).toHaveLength(1);
    expect(jobs[0]?.site).toEqual({ resourceGroup: 'rg', name: 'shop', slot: 'staging' });
    expect(jobs[0]?.id).toBe('rg/shop/staging:www.example.com');
  });
});
