/**
 * RFC 8555 ACME Nonce Manager
 *
 * Pools anti-replay nonces harvested from every ACME response and fetches a
 * fresh one from newNonce when the pool is empty.
 *
 * @see https://datatracker.ietf.org/doc/html/rfc8555#section-6.5
 */

import { BadNonceError } from '../errors/acme-errors.js';
import { createErrorFromProblem } from '../errors/factory.js';
import { headerValue, type HttpResponse } from '../transport/http-client.js';
import { withRetry, type RetryConfig } from '../transport/retry.js';
import { debugNonce } from '../utils/debug.js';

/** HEAD/GET against newNonce */
export type FetchLike = (url: string) => Promise<HttpResponse<unknown>>;

export interface NonceManagerOptions {
  /** Full URL of the ACME newNonce endpoint */
  newNonceUrl: string;
  fetch: FetchLike;
  /** Max nonce age (ms) before it is discarded. Defaults to 120 seconds. */
  maxAgeMs?: number;
  /** Hard cap on pool size. Defaults to 32. */
  maxPool?: number;
  /** Retry policy for newNonce requests */
  retry?: Partial<RetryConfig>;
}

export interface NonceEntry {
  value: string;
  timestamp: number;
}

export class NonceManager {
  private readonly newNonceUrl: string;
  private readonly fetch: FetchLike;
  private readonly maxAgeMs: number;
  private readonly maxPool: number;
  private readonly retry: Partial<RetryConfig>;
  private readonly pool: NonceEntry[] = [];

  constructor(opts: NonceManagerOptions) {
    this.newNonceUrl = opts.newNonceUrl;
    this.fetch = opts.fetch;
    this.maxAgeMs = opts.maxAgeMs ?? 120_000;
    this.maxPool = opts.maxPool ?? 32;
    this.retry = opts.retry ?? {};
  }

  /**
   * Newest pooled nonce, or a fresh one from newNonce
   */
  async get(): Promise<string> {
    this.cleanStale();

    const entry = this.pool.pop();
    if (entry) {
      debugNonce('get() returning pooled nonce, pool size now=%d', this.pool.length);
      return entry.value;
    }

    return this.fetchNewNonce();
  }

  get size(): number {
    return this.pool.length;
  }

  clear(): void {
    this.pool.length = 0;
  }

  /**
   * Run a signed request, retrying with a fresh nonce while the server answers badNonce
   */
  async withNonceRetry(
    fn: (nonce: string) => Promise<HttpResponse<unknown>>,
    maxAttempts = 3,
  ): Promise<HttpResponse<unknown>> {
    for (let attempt = 1; ; attempt++) {
      const nonce = await this.get();
      const res = await fn(nonce);

      this.putFromResponse(res);
      debugNonce('attempt %d: HTTP %d (pool size %d)', attempt, res.statusCode, this.pool.length);

      if (res.statusCode < 400 || attempt >= maxAttempts) {
        return res;
      }

      const ct = headerValue(res.headers, 'content-type')?.toLowerCase() ?? '';
      if (!ct.includes('problem+json') || !(createErrorFromProblem(res.body) instanceof BadNonceError)) {
        return res;
      }

      debugNonce('badNonce on attempt %d, retrying with a fresh nonce', attempt);
    }
  }

  putFromResponse(res: HttpResponse<unknown>): void {
    const nonce = headerValue(res.headers, 'replay-nonce');
    if (nonce) {
      this.putNonce(nonce);
    }
  }

  private async fetchNewNonce(): Promise<string> {
    debugNonce('fetching new nonce from %s', this.newNonceUrl);

    return withRetry(
      async () => {
        const response = await this.fetch(this.newNonceUrl);

        if (response.statusCode !== 200 && response.statusCode !== 204) {
          const err = createErrorFromProblem(response.body, response.statusCode);
          throw Object.assign(err, { statusCode: response.statusCode, headers: response.headers });
        }

        const nonce = headerValue(response.headers, 'replay-nonce');
        if (!nonce) {
          throw new BadNonceError('No replay-nonce header in response');
        }

        debugNonce('fetched new nonce=%s', nonce);
        return nonce;
      },
      this.retry,
      'new-nonce',
    );
  }

  private putNonce(nonce: string): void {
    if (this.pool.some((entry) => entry.value === nonce)) {
      return;
    }

    if (this.pool.length >= this.maxPool) {
      this.pool.shift();
    }

    this.pool.push({ value: nonce, timestamp: Date.now() });
  }

  private cleanStale(): void {
    const cutoff = Date.now() - this.maxAgeMs;
    for (let i = this.pool.length - 1; i >= 0; i--) {
      const entry = this.pool[i];
      if (entry && entry.timestamp < cutoff) {
        this.pool.splice(i, 1);
      }
    }
  }
}
