import { generateKeyPairSync } from 'node:crypto';
import * as forge from 'node-forge';

import type { AcmeApi } from '../../src/lib/types/acme-api.js';
import type { AcmeAuthorization, AcmeChallenge, AcmeOrder } from '../../src/lib/types/order.js';

export type ValidationScript = 'valid' | 'invalid';

export interface FakeAcmeOptions {
  /** Result of validation per created order, in creation order; 'valid' once exhausted */
  validations?: ValidationScript[];
  /** getOrder answers `pending` this many times after the challenges were answered */
  pendingPolls?: number;
  /** finalize answers `processing`; the next getOrder turns it `valid` */
  processingAfterFinalize?: boolean;
  validityDays?: number;
}

interface FakeChallenge {
  type: 'http-01' | 'dns-01';
  url: string;
  token: string;
  status: AcmeChallenge['status'];
  error?: { type: string; detail: string };
}

interface FakeAuthorization {
  url: string;
  identifier: string;
  wildcard: boolean;
  status: AcmeAuthorization['status'];
  challenges: FakeChallenge[];
}

interface FakeOrder {
  url: string;
  names: string[];
  status: AcmeOrder['status'];
  authorizations: FakeAuthorization[];
  outcome: ValidationScript;
  pendingPolls: number;
  certificate?: string;
  error?: { type: string; detail: string };
}

const BASE = 'https://ca.test/acme';

function toPem(cert: forge.pki.Certificate): string {
  return forge.pki.certificateToPem(cert).replace(/\r\n/g, '\n');
}

/**
 * In-process CA: orders, authorizations with http-01 and dns-01 challenges,
 * and real RSA certificates signed by a throwaway root
 */
export class FakeAcme implements AcmeApi {
  readonly orders: FakeOrder[] = [];
  readonly answered: string[] = [];
  readonly finalizedCsrs: string[] = [];
  readonly caPem: string;

  private readonly caKey: forge.pki.rsa.PrivateKey;
  private readonly caCert: forge.pki.Certificate;
  private readonly validations: ValidationScript[];
  private serial = 1;

  constructor(private readonly opts: FakeAcmeOptions = {}) {
    this.validations = [...(opts.validations ?? [])];

    const { privateKey, publicKey } = generateKeyPairSync('rsa', {
      modulusLength: 2048,
      publicKeyEncoding: { type: 'spki', format: 'pem' },
      privateKeyEncoding: { type: 'pkcs8', format: 'pem' },
    });
    this.caKey = forge.pki.privateKeyFromPem(privateKey);

    const ca = forge.pki.createCertificate();
    ca.publicKey = forge.pki.publicKeyFromPem(publicKey);
    ca.serialNumber = '01';
    ca.validity.notBefore = new Date(Date.now() - 60_000);
    ca.validity.notAfter = new Date(Date.now() + 365 * 24 * 60 * 60 * 1000);
    const attrs = [{ name: 'commonName', value: 'Fake Root X1' }];
    ca.setSubject(attrs);
    ca.setIssuer(attrs);
    ca.setExtensions([{ name: 'basicConstraints', cA: true }]);
    ca.sign(this.caKey, forge.md.sha256.create());
    this.caCert = ca;
    this.caPem = toPem(ca);
  }

  async createOrder(dnsNames: string[]): Promise<AcmeOrder> {
    const n = this.orders.length + 1;
    const order: FakeOrder = {
      url: `${BASE}/order/${n}`,
      names: [...dnsNames],
      status: 'pending',
      outcome: this.validations.shift() ?? 'valid',
      pendingPolls: this.opts.pendingPolls ?? 0,
      authorizations: dnsNames.map((name, i): FakeAuthorization => {
        const authzUrl = `${BASE}/authz/${n}-${i}`;
        return {
          url: authzUrl,
          identifier: name.replace(/^\*\./, ''),
          wildcard: name.startsWith('*.'),
          status: 'pending',
          challenges: (['http-01', 'dns-01'] as const).map(
            (type): FakeChallenge => ({ type, url: `${authzUrl}/${type}`, token: `token-${n}-${i}`, status: 'pending' }),
          ),
        };
      }),
    };
    this.orders.push(order);
    return this.view(order);
  }

  async getOrder(orderUrl: string): Promise<AcmeOrder> {
    const order = this.findOrder(orderUrl);
    this.advance(order);
    return this.view(order);
  }

  async getAuthorization(authzUrl: string): Promise<AcmeAuthorization> {
    const authz = this.orders.flatMap((o) => o.authorizations).find((a) => a.url === authzUrl);
    if (!authz) throw new Error(`unknown authorization ${authzUrl}`);
    return {
      identifier: { type: 'dns', value: authz.identifier },
      status: authz.status,
      challenges: authz.challenges.map((ch) => this.challengeView(ch)),
      ...(authz.wildcard ? { wildcard: true } : {}),
    };
  }

  async getChallenge(challengeUrl: string): Promise<AcmeChallenge> {
    return this.challengeView(this.findChallenge(challengeUrl));
  }

  async answerChallenge(challengeUrl: string): Promise<AcmeChallenge> {
    const challenge = this.findChallenge(challengeUrl);
    this.answered.push(challengeUrl);
    challenge.status = 'processing';
    return this.challengeView(challenge);
  }

  async keyAuthorization(token: string): Promise<string> {
    return `${token}.test-thumbprint`;
  }

  async finalize(order: AcmeOrder, csrDerBase64Url: string): Promise<AcmeOrder> {
    const fake = this.findOrder(order.url);
    if (fake.status !== 'ready') {
      throw new Error(`order ${order.url} is ${fake.status}, not ready`);
    }

    this.finalizedCsrs.push(csrDerBase64Url);
    fake.certificate = this.issue(fake, csrDerBase64Url);
    fake.status = this.opts.processingAfterFinalize ? 'processing' : 'valid';
    return this.view(fake);
  }

  async downloadCertificate(order: AcmeOrder): Promise<string> {
    const fake = this.findOrder(order.url);
    if (!fake.certificate) throw new Error(`order ${order.url} has no certificate`);
    return `${fake.certificate}${this.caPem}`;
  }

  /** Test hook: force an order into a status, e.g. to simulate expiry */
  setOrderStatus(orderUrl: string, status: AcmeOrder['status']): void {
    this.findOrder(orderUrl).status = status;
  }

  private advance(order: FakeOrder): void {
    if (order.status === 'processing' && order.certificate) {
      order.status = 'valid';
      return;
    }
    if (order.status !== 'pending') return;

    const allAnswered = order.authorizations.every(
      (a) => a.status === 'valid' || a.challenges.some((ch) => ch.status !== 'pending'),
    );
    if (!allAnswered) return;

    if (order.pendingPolls > 0) {
      order.pendingPolls -= 1;
      return;
    }

    for (const authz of order.authorizations) {
      for (const ch of authz.challenges) {
        if (ch.status !== 'processing') continue;
        if (order.outcome === 'valid') {
          ch.status = 'valid';
        } else {
          ch.status = 'invalid';
          ch.error = {
            type: 'urn:ietf:params:acme:error:unauthorized',
            detail: `Incorrect TXT record found at _acme-challenge.${authz.identifier}`,
          };
        }
      }
      authz.status = order.outcome === 'valid' ? 'valid' : 'invalid';
    }

    order.status = order.outcome === 'valid' ? 'ready' : 'invalid';
    if (order.outcome === 'invalid') {
      order.error = { type: 'urn:ietf:params:acme:error:unauthorized', detail: 'authorization failed' };
    }
  }

  private issue(order: FakeOrder, csrDerBase64Url: string): string {
    const der = Buffer.from(csrDerBase64Url, 'base64url').toString('binary');
    const csr = forge.pki.certificationRequestFromAsn1(forge.asn1.fromDer(der));
    if (!csr.publicKey) throw new Error('CSR has no public key');

    const cert = forge.pki.createCertificate();
    cert.publicKey = csr.publicKey;
    cert.serialNumber = (++this.serial).toString(16).padStart(2, '0');
    cert.validity.notBefore = new Date(Date.now() - 60_000);
    cert.validity.notAfter = new Date(Date.now() + (this.opts.validityDays ?? 90) * 24 * 60 * 60 * 1000);
    cert.setSubject([{ name: 'commonName', value: order.names[0] }]);
    cert.setIssuer(this.caCert.subject.attributes);
    cert.setExtensions([
      { name: 'subjectAltName', altNames: order.names.map((value) => ({ type: 2, value })) },
    ]);
    cert.sign(this.caKey, forge.md.sha256.create());
    return toPem(cert);
  }

  private view(order: FakeOrder): AcmeOrder {
    return {
      url: order.url,
      status: order.status,
      identifiers: order.names.map((value) => ({ type: 'dns', value })),
      authorizations: order.authorizations.map((a) => a.url),
      finalize: `${order.url}/finalize`,
      ...(order.certificate && order.status === 'valid' ? { certificate: `${order.url}/cert` } : {}),
      ...(order.error ? { error: order.error } : {}),
    };
  }

  private challengeView(ch: FakeChallenge): AcmeChallenge {
    return {
      type: ch.type,
      url: ch.url,
      status: ch.status,
      token: ch.token,
      ...(ch.error ? { error: ch.error } : {}),
    };
  }

  private findOrder(url: string): FakeOrder {
    const order = this.orders.find((o) => o.url === url);
    if (!order) throw new Error(`unknown order ${url}`);
    return order;
  }

  private findChallenge(url: string): FakeChallenge {
    const challenge = this.orders
      .flatMap((o) => o.authorizations)
      .flatMap((a) => a.challenges)
      .find((ch) => ch.url === url);
    if (!challenge) throw new Error(`unknown challenge ${url}`);
    return challenge;
  }
}
