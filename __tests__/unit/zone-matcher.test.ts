import { describe, it, expect } from '@jest/globals';

import { findZone, matchZones, verifyDelegation } from '../../src/lib/dns/zone-matcher.js';
import { NameServerMismatchError, ZoneNotFoundError } from '../../src/lib/errors/workflow-errors.js';
import type { LiveDnsResolver } from '../../src/lib/dns/resolver.js';
import { zone } from '../utils/fakes.js';

function resolverWith(ns: Record<string, string[]>): LiveDnsResolver & { asked: string[] } {
  const asked: string[] = [];
  return {
    asked,
    async resolveNs(name) {
      asked.push(name);
      return ns[name] ?? [];
    },
    async resolveTxt() {
      return [];
    },
  };
}

describe('findZone', () => {
  const zones = [zone('example.com'), zone('shop.example.com'), zone('example.org')];

  it('picks the longest owning zone', () => {
    expect(findZone('www.shop.example.com', zones)?.name).toBe('shop.example.com');
    expect(findZone('www.example.com', zones)?.name).toBe('example.com');
  });

  it('matches the apex itself', () => {
    expect(findZone('example.org', zones)?.name).toBe('example.org');
  });

  it('ignores case and a trailing dot', () => {
    expect(findZone('WWW.Example.COM.', zones)?.name).toBe('example.com');
  });

  it('requires a label boundary', () => {
    expect(findZone('notexample.com', zones)).toBeUndefined();
  });

  it('keeps the first of two equally long zones', () => {
    const dupes = [{ ...zone('example.com'), id: '/first' }, { ...zone('example.com'), id: '/second' }];
    expect(findZone('a.example.com', dupes)?.id).toBe('/first');
  });
});

describe('matchZones', () => {
  it('maps every name to its zone', () => {
    const matched = matchZones(['a.example.com', 'example.org'], [zone('example.com'), zone('example.org')]);
    expect([...matched].map(([name, z]) => [name, z.name])).toEqual([
      ['a.example.com', 'example.com'],
      ['example.org', 'example.org'],
    ]);
  });

  it('lists every unmatched name in one error', () => {
    let caught: unknown;
    try {
      matchZones(['a.example.net', 'a.example.com', 'b.example.io'], [zone('example.com')]);
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ZoneNotFoundError);
    expect(caught).toMatchObject({ names: ['a.example.net', 'b.example.io'], kind: 'precondition' });
  });
});

describe('verifyDelegation', () => {
  it('accepts any overlap, ignoring case and trailing dots', async () => {
    const resolver = resolverWith({ 'example.com': ['NS2.DNS.TEST.', 'ns9.elsewhere.test'] });
    await expect(verifyDelegation([zone('example.com')], resolver)).resolves.toBeUndefined();
  });

  it('asks once per zone and skips zones without name servers', async () => {
    const resolver = resolverWith({ 'example.com': ['ns1.dns.test'] });
    const z = zone('example.com');

    await verifyDelegation([z, z, zone('example.org', [])], resolver);

    expect(resolver.asked).toEqual(['example.com']);
  });

  it('reports expected and actual name servers on mismatch', async () => {
    const resolver = resolverWith({});

    await expect(verifyDelegation([zone('example.com')], resolver)).rejects.toThrow(
      new NameServerMismatchError('example.com', ['ns1.dns.test', 'ns2.dns.test'], []),
    );
    await expect(verifyDelegation([zone('example.com')], resolver)).rejects.toThrow(
      'Name servers for zone example.com do not match. Expected: ns1.dns.test, ns2.dns.test. Actual: (none)',
    );
  });
});
