/**
 * RFC 8555 ACME Account
 *
 * Signed (JWS, ES256) requests for one account key: registration, orders,
 * authorizations, challenges, finalization and certificate download.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555
 */

import * as jose from 'jose';
import type { ZodType, ZodTypeDef } from 'zod';

import type { AcmeClient } from './acme-client.js';
import {
  acmeAuthorizationSchema,
  acmeChallengeSchema,
  acmeOrderBodySchema,
  type AcmeAuthorization,
  type AcmeChallenge,
  type AcmeOrder,
} from '../types/order.js';
import type { AcmeApi } from '../types/acme-api.js';
import { createErrorFromProblem } from '../errors/factory.js';
import { AcmeError, MalformedError } from '../errors/acme-errors.js';
import { headerValue, headerValues, type HttpResponse } from '../transport/http-client.js';
import { selectPreferredChain } from '../crypto/certificate.js';
import { parseLinkHeader } from '../utils/index.js';
import { debugAcme } from '../utils/debug.js';

/**
 * Account key pair; used only for ACME authentication, never for certificates
 */
export interface AccountKeys {
  privateKey: CryptoKey;
  publicKey: CryptoKey;
}

export interface AcmeAccountOptions {
  /** Account URL from a previous registration */
  kid?: string;
  /** Contact emails, with or without `mailto:` */
  contact?: string[];
}

export interface AccountRegistration {
  accountUrl: string;
  status: string | undefined;
}

export class AcmeAccount implements AcmeApi {
  public readonly keys: AccountKeys;
  public kid: string | undefined;

  private readonly client: AcmeClient;
  private readonly contact: string[];
  private registering?: Promise<AccountRegistration>;

  constructor(client: AcmeClient, keys: AccountKeys, opts: AcmeAccountOptions = {}) {
    this.client = client;
    this.keys = keys;
    this.kid = opts.kid;
    this.contact = opts.contact ?? [];
  }

  /**
   * Register the account key, or look up the existing account for it
   * (newAccount answers 200 with the existing account URL).
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.3
   */
  async register(): Promise<AccountRegistration> {
    const directory = await this.client.getDirectory();
    const payload = {
      contact: this.contact.map((email) => (email.startsWith('mailto:') ? email : `mailto:${email}`)),
      termsOfServiceAgreed: true,
    };

    const response = await this.signedPost(directory.newAccount, payload, true);
    if (response.statusCode !== 200 && response.statusCode !== 201) {
      throw createErrorFromProblem(response.body, response.statusCode);
    }

    const accountUrl = headerValue(response.headers, 'location');
    if (!accountUrl) {
      throw new MalformedError('newAccount response has no Location header', response.statusCode);
    }

    this.kid = accountUrl;
    const status =
      typeof response.body === 'object' && response.body !== null && 'status' in response.body
        ? String(response.body.status)
        : undefined;

    debugAcme('account %s (%s) status=%s', accountUrl, response.statusCode === 201 ? 'created' : 'existing', status);
    return { accountUrl, status };
  }

  async createOrder(dnsNames: string[]): Promise<AcmeOrder> {
    const directory = await this.client.getDirectory();
    const payload = { identifiers: dnsNames.map((value) => ({ type: 'dns', value })) };

    const response = await this.signedPost(directory.newOrder, payload);
    if (response.statusCode !== 201) {
      throw createErrorFromProblem(response.body, response.statusCode);
    }

    const url = headerValue(response.headers, 'location');
    if (!url) {
      throw new MalformedError('newOrder response has no Location header', response.statusCode);
    }

    const order = { ...this.parse(acmeOrderBodySchema, response, 'order'), url };
    debugAcme('order created %s status=%s authorizations=%d', url, order.status, order.authorizations.length);
    return order;
  }

  async getOrder(orderUrl: string): Promise<AcmeOrder> {
    const response = await this.postAsGet(orderUrl);
    return { ...this.parse(acmeOrderBodySchema, response, 'order'), url: orderUrl };
  }

  async getAuthorization(authzUrl: string): Promise<AcmeAuthorization> {
    return this.parse(acmeAuthorizationSchema, await this.postAsGet(authzUrl), 'authorization');
  }

  async getChallenge(challengeUrl: string): Promise<AcmeChallenge> {
    return this.parse(acmeChallengeSchema, await this.postAsGet(challengeUrl), 'challenge');
  }

  /**
   * Empty JSON object signals the proof is in place
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-7.5.1
   */
  async answerChallenge(challengeUrl: string): Promise<AcmeChallenge> {
    const response = await this.signedPost(challengeUrl, {});
    if (response.statusCode !== 200) {
      throw createErrorFromProblem(response.body, response.statusCode);
    }
    return this.parse(acmeChallengeSchema, response, 'challenge');
  }

  async keyAuthorization(token: string): Promise<string> {
    const jwk = await jose.exportJWK(this.keys.publicKey);
    const thumbprint = await jose.calculateJwkThumbprint(jwk, 'sha256');
    return `${token}.${thumbprint}`;
  }

  async finalize(order: AcmeOrder, csrDerBase64Url: string): Promise<AcmeOrder> {
    const response = await this.signedPost(order.finalize, { csr: csrDerBase64Url });
    if (response.statusCode !== 200) {
      throw createErrorFromProblem(response.body, response.statusCode);
    }
    return { ...this.parse(acmeOrderBodySchema, response, 'order'), url: order.url };
  }

  /**
   * Download the chain; with `preferredChain`, also fetch every
   * `Link: rel="alternate"` chain and pick by top issuer CN.
   */
  async downloadCertificate(order: AcmeOrder, preferredChain?: string): Promise<string> {
    if (!order.certificate) {
      throw new AcmeError(`Order ${order.url} has no certificate URL`, 400);
    }

    const first = await this.fetchChain(order.certificate);
    if (!preferredChain) {
      return first.chain;
    }

    const chains = [first.chain];
    for (const link of first.alternates) {
      chains.push((await this.fetchChain(link)).chain);
    }

    const selected = selectPreferredChain(chains, preferredChain) ?? first.chain;
    debugAcme('selected chain %d of %d for preferred issuer %s', chains.indexOf(selected) + 1, chains.length, preferredChain);
    return selected;
  }

  private async fetchChain(url: string): Promise<{ chain: string; alternates: string[] }> {
    const response = await this.signedPost(url, '', false, { Accept: 'application/pem-certificate-chain' });
    if (response.statusCode !== 200) {
      throw createErrorFromProblem(response.body, response.statusCode);
    }

    const body = response.body;
    const chain = typeof body === 'string' ? body : Buffer.isBuffer(body) ? body.toString('utf8') : '';
    if (!chain.includes('-----BEGIN CERTIFICATE-----')) {
      throw new AcmeError(`Certificate download from ${url} did not return a PEM chain`, 500);
    }

    const alternates = parseLinkHeader(headerValues(response.headers, 'link'))
      .filter((entry) => entry.rel === 'alternate')
      .map((entry) => new URL(entry.url, url).toString());

    return { chain, alternates };
  }

  private async postAsGet(url: string): Promise<HttpResponse> {
    const response = await this.signedPost(url, '');
    if (response.statusCode !== 200) {
      throw createErrorFromProblem(response.body, response.statusCode);
    }
    return response;
  }

  private parse<T>(schema: ZodType<T, ZodTypeDef, unknown>, response: HttpResponse, what: string): T {
    const parsed = schema.safeParse(response.body);
    if (!parsed.success) {
      throw new AcmeError(`Unexpected ${what} response: ${parsed.error.message}`, response.statusCode);
    }
    return parsed.data;
  }

  private async ensureAccount(): Promise<string> {
    if (this.kid) return this.kid;

    this.registering ??= this.register();
    try {
      return (await this.registering).accountUrl;
    } finally {
      this.registering = undefined;
    }
  }

  /**
   * JWS-signed POST with badNonce retry. `forceJwk` embeds the public key
   * instead of the account URL (newAccount only).
   *
   * @see https://datatracker.ietf.org/doc/html/rfc8555#section-6.2
   */
  private async signedPost(
    url: string,
    payload: string | Record<string, unknown>,
    forceJwk = false,
    extraHeaders: Record<string, string> = {},
  ): Promise<HttpResponse> {
    const kid = forceJwk ? undefined : await this.ensureAccount();
    const nonceManager = await this.client.getNonceManager();

    return nonceManager.withNonceRetry(async (nonce) => {
      const protectedHeader: jose.JWSHeaderParameters & { nonce: string; url: string } = {
        alg: 'ES256',
        nonce,
        url,
      };

      if (kid) {
        protectedHeader.kid = kid;
      } else {
        protectedHeader.jwk = await jose.exportJWK(this.keys.publicKey);
      }

      // POST-as-GET signs an empty payload
      const encodedPayload =
        payload === '' ? new Uint8Array(0) : new TextEncoder().encode(JSON.stringify(payload));

      const jws = await new jose.FlattenedSign(encodedPayload)
        .setProtectedHeader(protectedHeader)
        .sign(this.keys.privateKey);

      return this.client.getHttp().post(url, jws, {
        'Content-Type': 'application/jose+json',
        ...extraHeaders,
      });
    });
  }
}
