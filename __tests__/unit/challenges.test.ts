import { describe, it, expect, beforeAll, afterEach, beforeEach } from '@jest/globals';
import { createHash } from 'node:crypto';
import { MockAgent } from 'undici';

import {
  ChallengeResolver,
  dns01RecordName,
  dns01Value,
  http01Path,
  http01Url,
} from '../../src/lib/challenges/challenge-resolver.js';
import { ChallengeVerifier, MAX_PROBE_REDIRECTS, createHttpProbe } from '../../src/lib/challenges/challenge-verifier.js';
import { HttpClient } from '../../src/lib/transport/http-client.js';
import { ChallengeTypeConflictError, DeploymentError, RetriableValidationError } from '../../src/lib/errors/workflow-errors.js';
import type { SiteRef } from '../../src/lib/types/domain.js';
import type { ControlPlaneResult } from '../../src/lib/providers/hosting.js';
import type { AcmeAuthorization } from '../../src/lib/types/order.js';
import { FakeAcme } from '../utils/fake-acme.js';
import { FakeDnsProvider, FakeHosting, FakeResolver, hostedSite, hostingProbe, zone } from '../utils/fakes.js';

const SITE = { resourceGroup: 'rg', name: 'shop' };

describe('proof derivation', () => {
  it('builds the HTTP-01 path and URL from the token', () => {
    expect(http01Path('tok')).toBe('.well-known/acme-challenge/tok');
    expect(http01Url('www.example.com', 'tok')).toBe('http://www.example.com/.well-known/acme-challenge/tok');
  });

  it('drops the wildcard label from the DNS-01 record name', () => {
    expect(dns01RecordName('*.example.com')).toBe('_acme-challenge.example.com');
    expect(dns01RecordName('www.example.com')).toBe('_acme-challenge.www.example.com');
  });

  it('hashes the key authorization for DNS-01', () => {
    const expected = createHash('sha256').update('tok.thumb').digest('base64url');
    expect(dns01Value('tok.thumb')).toBe(expected);
    expect(dns01Value('tok.thumb')).not.toMatch(/[+/=]/);
  });
});

describe('ChallengeResolver', () => {
  let acme: FakeAcme;

  beforeAll(() => {
    acme = new FakeAcme();
  });

  it('derives HTTP-01 proofs without writing them', async () => {
    const hosting = new FakeHosting([hostedSite('shop', ['www.example.com'])]);
    const order = await acme.createOrder(['www.example.com']);
    const n = acme.orders.length;

    const results = await new ChallengeResolver({ acme, hosting }).resolve(order.authorizations, 'http-01');

    expect(results).toEqual([
      {
        challengeUrl: `https://ca.test/acme/authz/${n}-0/http-01`,
        proof: {
          kind: 'http-01',
          url: `http://www.example.com/.well-known/acme-challenge/token-${n}-0`,
          path: `.well-known/acme-challenge/token-${n}-0`,
          value: `token-${n}-0.test-thumbprint`,
        },
      },
    ]);
    expect(hosting.files.size).toBe(0);
  });

  it('publishes HTTP-01 files to the site', async () => {
    const hosting = new FakeHosting([hostedSite('shop', ['www.example.com'])]);

    await new ChallengeResolver({ acme, hosting }).publishHttpProofs(SITE, [
      {
        kind: 'http-01',
        url: 'http://www.example.com/.well-known/acme-challenge/tok',
        path: '.well-known/acme-challenge/tok',
        value: 'tok.thumb',
      },
    ]);

    expect(hosting.files.get('.well-known/acme-challenge/tok')).toBe('tok.thumb');
  });

  it('derives DNS-01 proofs without touching the site', async () => {
    const hosting = new FakeHosting();
    const order = await acme.createOrder(['*.example.com']);
    const n = acme.orders.length;

    const results = await new ChallengeResolver({ acme, hosting }).resolve(order.authorizations, 'dns-01');

    expect(results.map((r) => r.proof)).toEqual([
      { kind: 'dns-01', recordName: '_acme-challenge.example.com', value: dns01Value(`token-${n}-0.test-thumbprint`) },
    ]);
    expect(hosting.files.size).toBe(0);
  });

  it('skips authorizations that are already valid', async () => {
    class ValidAuthz extends FakeAcme {
      override async getAuthorization(): Promise<AcmeAuthorization> {
        return { identifier: { type: 'dns', value: 'www.example.com' }, status: 'valid', challenges: [] };
      }
    }

    const results = await new ChallengeResolver({ acme: new ValidAuthz(), hosting: new FakeHosting() }).resolve(
      ['https://ca.test/acme/authz/x'],
      'http-01',
    );
    expect(results).toEqual([]);
  });

  it('rejects a challenge type the CA does not offer', async () => {
    class AlpnOnly extends FakeAcme {
      override async getAuthorization(): Promise<AcmeAuthorization> {
        return {
          identifier: { type: 'dns', value: 'www.example.com' },
          status: 'pending',
          challenges: [{ type: 'tls-alpn-01', url: 'https://ca.test/ch', status: 'pending', token: 't' }],
        };
      }
    }

    await expect(
      new ChallengeResolver({ acme: new AlpnOnly(), hosting: new FakeHosting() }).resolve(
        ['https://ca.test/a'],
        'dns-01',
      ),
    ).rejects.toThrow(new ChallengeTypeConflictError('www.example.com', 'dns-01', ['tls-alpn-01']));
  });

  it('raises a deployment error when the file cannot be written', async () => {
    class ReadOnlyHosting extends FakeHosting {
      override async writeFile(_site: SiteRef, path: string, content: string): Promise<ControlPlaneResult> {
        return { statusCode: 403, target: path, payloadSize: content.length };
      }
    }
    const hosting = new ReadOnlyHosting();
    const resolver = new ChallengeResolver({ acme, hosting });
    const order = await acme.createOrder(['www.example.com']);
    const results = await resolver.resolve(order.authorizations, 'http-01');
    const proofs = results.flatMap((r) => (r.proof.kind === 'http-01' ? [r.proof] : []));

    const error = await resolver.publishHttpProofs(SITE, proofs).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(DeploymentError);
    expect(error instanceof DeploymentError && error.kind).toBe('fatal');
  });
});

describe('ChallengeVerifier', () => {
  it('accepts a served HTTP-01 value, ignoring surrounding whitespace', async () => {
    const hosting = new FakeHosting();
    hosting.files.set('.well-known/acme-challenge/tok', 'tok.thumb\n');
    const verifier = new ChallengeVerifier({ resolver: new FakeResolver(new FakeDnsProvider()), probe: hostingProbe(hosting) });

    await expect(
      verifier.verify({ kind: 'http-01', url: 'http://www.example.com/.well-known/acme-challenge/tok', path: '', value: 'tok.thumb' }),
    ).resolves.toBeUndefined();
  });

  it('reports what was served instead', async () => {
    const verifier = new ChallengeVerifier({
      resolver: new FakeResolver(new FakeDnsProvider()),
      probe: async () => ({ statusCode: 404, body: 'nope' }),
    });

    await expect(
      verifier.verify({ kind: 'http-01', url: 'http://www.example.com/x', path: 'x', value: 'tok.thumb' }),
    ).rejects.toThrow('http://www.example.com/x returned status 404. Expected: "tok.thumb". Actual: "nope"');
  });

  it('wraps probe failures as retriable', async () => {
    const verifier = new ChallengeVerifier({
      resolver: new FakeResolver(new FakeDnsProvider()),
      probe: async () => {
        throw new Error('socket hang up');
      },
    });

    const err = await verifier
      .verify({ kind: 'http-01', url: 'http://www.example.com/x', path: 'x', value: 'v' })
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RetriableValidationError);
    expect(err).toMatchObject({ message: 'http://www.example.com/x could not be checked: socket hang up' });
  });

  it('checks that the TXT value is among the published ones', async () => {
    const dns = new FakeDnsProvider([zone('example.com')]);
    dns.records.set('example.com|_acme-challenge', { ttl: 60, values: ['other', 'wanted'] });
    const verifier = new ChallengeVerifier({ resolver: new FakeResolver(dns), probe: hostingProbe(new FakeHosting()) });

    await expect(
      verifier.verify({ kind: 'dns-01', recordName: '_acme-challenge.example.com', value: 'wanted' }),
    ).resolves.toBeUndefined();
    await expect(
      verifier.verify({ kind: 'dns-01', recordName: '_acme-challenge.example.com', value: 'missing' }),
    ).rejects.toThrow(
      '_acme-challenge.example.com value is not correct. Expected: "missing". Actual: "other", "wanted"',
    );
  });
});

describe('createHttpProbe', () => {
  const PATH = '/.well-known/acme-challenge/tok';
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('follows a redirect from http to https', async () => {
    agent
      .get('http://www.example.com')
      .intercept({ path: PATH, method: 'GET' })
      .reply(301, '', { headers: { location: `https://www.example.com${PATH}` } });
    agent
      .get('https://www.example.com')
      .intercept({ path: PATH, method: 'GET' })
      .reply(200, 'tok.thumb', { headers: { 'content-type': 'text/plain' } });

    const probe = createHttpProbe(new HttpClient({ dispatcher: agent }));
    const verifier = new ChallengeVerifier({ resolver: new FakeResolver(new FakeDnsProvider()), probe });

    const proof = { kind: 'http-01', url: `http://www.example.com${PATH}`, path: PATH.slice(1), value: 'tok.thumb' } as const;

    await expect(verifier.verify(proof)).resolves.toBeUndefined();
  });

  it('resolves a relative location against the current URL', async () => {
    const pool = agent.get('http://www.example.com');
    pool.intercept({ path: PATH, method: 'GET' }).reply(302, '', { headers: { location: '/moved/tok' } });
    pool
      .intercept({ path: '/moved/tok', method: 'GET' })
      .reply(200, 'tok.thumb', { headers: { 'content-type': 'text/plain' } });

    const res = await createHttpProbe(new HttpClient({ dispatcher: agent }))(`http://www.example.com${PATH}`);

    expect(res).toEqual({ statusCode: 200, body: 'tok.thumb' });
  });

  it('stops after the redirect limit', async () => {
    agent
      .get('http://www.example.com')
      .intercept({ path: '/loop', method: 'GET' })
      .reply(302, '', { headers: { location: '/loop' } })
      .times(MAX_PROBE_REDIRECTS + 1);

    const res = await createHttpProbe(new HttpClient({ dispatcher: agent }))('http://www.example.com/loop');

    expect(res.statusCode).toBe(302);
    expect(agent.pendingInterceptors()).toHaveLength(0);
  });
});
