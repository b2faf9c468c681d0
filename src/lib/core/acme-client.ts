import { HttpClient, type HttpClientOptions } from '../transport/http-client.js';
import { acmeDirectorySchema, type AcmeDirectory } from '../types/directory.js';
import type { AcmeDirectoryEntry } from '../../directory.js';
import { NonceManager, type NonceManagerOptions } from '../managers/nonce-manager.js';
import { createErrorFromProblem } from '../errors/factory.js';
import { AcmeError } from '../errors/acme-errors.js';
import { debugAcme } from '../utils/debug.js';

export interface AcmeClientOptions {
  /** NonceManager overrides (pool size, max age, retry) */
  nonce?: Partial<Omit<NonceManagerOptions, 'newNonceUrl' | 'fetch'>>;
  /** Transport options; tests pass an undici MockAgent dispatcher */
  http?: HttpClientOptions;
}

/**
 * ACME directory client
 *
 * Fetches and caches the directory, owns the HTTP transport and the shared
 * nonce pool for one CA.
 */
export class AcmeClient {
  public readonly directoryUrl: string;
  private readonly opts: AcmeClientOptions;
  private readonly http: HttpClient;

  private directory?: AcmeDirectory;
  private nonce?: NonceManager;

  constructor(directoryUrlOrEntry: string | AcmeDirectoryEntry, opts: AcmeClientOptions = {}) {
    this.directoryUrl =
      typeof directoryUrlOrEntry === 'string' ? directoryUrlOrEntry : directoryUrlOrEntry.directoryUrl;
    this.opts = opts;
    this.http = new HttpClient(opts.http);
  }

  public async getDirectory(): Promise<AcmeDirectory> {
    if (this.directory) return this.directory;

    debugAcme('loading directory %s', this.directoryUrl);
    const res = await this.http.get(this.directoryUrl);
    if (res.statusCode !== 200) {
      throw createErrorFromProblem(res.body, res.statusCode);
    }

    const parsed = acmeDirectorySchema.safeParse(res.body);
    if (!parsed.success) {
      throw new AcmeError(`Invalid ACME directory at ${this.directoryUrl}: ${parsed.error.message}`, 500);
    }

    this.directory = parsed.data;
    return this.directory;
  }

  public getHttp(): HttpClient {
    return this.http;
  }

  public async getNonceManager(): Promise<NonceManager> {
    if (!this.nonce) {
      const directory = await this.getDirectory();
      this.nonce = new NonceManager({
        newNonceUrl: directory.newNonce,
        fetch: (url: string) => this.http.head(url),
        ...this.opts.nonce,
      });
    }
    return this.nonce;
  }
}
