/**
 * Confirms a proof is observable from outside before the CA is asked to
 * validate it
 */

import type { ChallengeProof, DnsProof, HttpProof } from '../types/domain.js';
import type { LiveDnsResolver } from '../dns/resolver.js';
import { headerValue, type HttpClient } from '../transport/http-client.js';
import { RetriableValidationError } from '../errors/workflow-errors.js';
import { debugChallenge } from '../utils/debug.js';

export interface ProbeResponse {
  statusCode: number;
  body: string;
}

export type HttpProbe = (url: string) => Promise<ProbeResponse>;

/** Same limit the CA applies when it follows redirects for HTTP-01 */
export const MAX_PROBE_REDIRECTS = 10;

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

function bodyText(body: unknown): string {
  if (typeof body === 'string') return body;
  if (Buffer.isBuffer(body)) return body.toString('utf8');
  return body === undefined ? '' : JSON.stringify(body);
}

/**
 * GET through the shared transport, body as text. Redirects are followed
 * the way the CA follows them, HTTP to HTTPS included.
 */
export function createHttpProbe(http: HttpClient): HttpProbe {
  return async (url) => {
    let current = url;
    for (let hop = 0; ; hop++) {
      const res = await http.get(current, { Accept: 'text/plain' });
      const location = headerValue(res.headers, 'location');
      if (!REDIRECT_STATUSES.has(res.statusCode) || location === undefined || hop === MAX_PROBE_REDIRECTS) {
        return { statusCode: res.statusCode, body: bodyText(res.body) };
      }
      const next = new URL(location, current).toString();
      debugChallenge('probe %s redirected (%d) to %s', current, res.statusCode, next);
      current = next;
    }
  };
}

export interface ChallengeVerifierDeps {
  resolver: LiveDnsResolver;
  probe: HttpProbe;
}

export class ChallengeVerifier {
  constructor(private readonly deps: ChallengeVerifierDeps) {}

  /** Throws RetriableValidationError while the proof is not observable */
  async verify(proof: ChallengeProof): Promise<void> {
    switch (proof.kind) {
      case 'http-01':
        return this.verifyHttp(proof);
      case 'dns-01':
        return this.verifyDns(proof);
    }
  }

  async verifyAll(proofs: readonly ChallengeProof[]): Promise<void> {
    for (const proof of proofs) {
      await this.verify(proof);
    }
  }

  private async verifyHttp(proof: HttpProof): Promise<void> {
    let response: ProbeResponse;
    try {
      response = await this.deps.probe(proof.url);
    } catch (err) {
      throw RetriableValidationError.transport(proof.url, err);
    }

    const actual = response.body.trim();
    if (response.statusCode < 200 || response.statusCode >= 300 || actual !== proof.value) {
      throw RetriableValidationError.httpMismatch(proof.url, proof.value, actual, response.statusCode);
    }

    debugChallenge('%s serves the expected key authorization', proof.url);
  }

  private async verifyDns(proof: DnsProof): Promise<void> {
    let values: string[];
    try {
      values = await this.deps.resolver.resolveTxt(proof.recordName);
    } catch (err) {
      throw RetriableValidationError.transport(proof.recordName, err);
    }

    if (values.length === 0) {
      throw RetriableValidationError.dnsNotResolved(proof.recordName);
    }

    if (!values.includes(proof.value)) {
      throw RetriableValidationError.dnsMismatch(proof.recordName, proof.value, values);
    }

    debugChallenge('%s has the expected TXT value', proof.recordName);
  }
}
