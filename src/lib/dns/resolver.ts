import { Resolver } from 'node:dns/promises';
import { debugDns } from '../utils/debug.js';

/**
 * Live DNS lookups used for delegation checks and DNS-01 pre-verification
 */
export interface LiveDnsResolver {
  resolveNs(zone: string): Promise<string[]>;
  /** TXT values with their fragments joined; empty when the name has none */
  resolveTxt(name: string): Promise<string[]>;
}

export interface NodeDnsResolverOptions {
  /** Recursive servers to ask instead of the system ones */
  servers?: string[];
  /** Per-query timeout (ms) */
  timeoutMs?: number;
  tries?: number;
}

/** Answers that mean "no such record" rather than a failed lookup */
const EMPTY_ANSWER_CODES = new Set(['ENODATA', 'ENOTFOUND']);

/** Concatenate TXT record fragments (as returned by dns.resolveTxt) */
export function normalizeTxtFragments(fragments: ReadonlyArray<string>): string {
  return fragments.join('');
}

export class NodeDnsResolver implements LiveDnsResolver {
  private readonly resolver: Resolver;

  constructor(opts: NodeDnsResolverOptions = {}) {
    this.resolver = new Resolver({ timeout: opts.timeoutMs ?? 5000, tries: opts.tries ?? 2 });
    if (opts.servers?.length) {
      this.resolver.setServers(opts.servers);
    }
  }

  async resolveNs(zone: string): Promise<string[]> {
    try {
      return await this.resolver.resolveNs(zone);
    } catch (err) {
      if (isEmptyAnswer(err)) {
        debugDns('no NS records for %s', zone);
        return [];
      }
      throw err;
    }
  }

  async resolveTxt(name: string): Promise<string[]> {
    try {
      const records = await this.resolver.resolveTxt(name);
      return records.map(normalizeTxtFragments);
    } catch (err) {
      if (isEmptyAnswer(err)) {
        debugDns('no TXT records for %s', name);
        return [];
      }
      throw err;
    }
  }
}

function isEmptyAnswer(err: unknown): boolean {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' && EMPTY_ANSWER_CODES.has(err.code);
}
