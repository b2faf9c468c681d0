import { request, type Dispatcher } from 'undici';
import { debugHttp } from '../utils/debug.js';
import { buildUserAgent } from '../utils/user-agent.js';
import { errorMessage } from '../utils/index.js';

export type ResponseHeaders = Dispatcher.ResponseData['headers'];

export interface HttpResponse<T = unknown> {
  statusCode: number;
  headers: ResponseHeaders;
  body: T;
}

export interface HttpClientOptions {
  /** undici dispatcher (Agent, ProxyAgent, MockAgent in tests) */
  dispatcher?: Dispatcher;
  /** Headers sent with every request, e.g. Authorization */
  headers?: Record<string, string>;
  /** Applies to both the headers and the body phase */
  timeoutMs?: number;
}

type RequestBody = string | Uint8Array | null;

/**
 * Undici-based HTTP transport shared by the ACME account, the resource-manager
 * clients, the HTTP-01 probe and the webhook notifier.
 *
 * - Automatic User-Agent injection
 * - Content-type aware body parsing (JSON, text, binary)
 * - Debug logging under `sitecert:http`
 */
export class HttpClient {
  private static userAgent = buildUserAgent();

  constructor(private readonly options: HttpClientOptions = {}) {}

  get(url: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
    return this.send('GET', url, undefined, headers);
  }

  post(url: string, body: unknown, headers: Record<string, string> = {}): Promise<HttpResponse> {
    return this.send('POST', url, body, headers);
  }

  put(url: string, body: unknown, headers: Record<string, string> = {}): Promise<HttpResponse> {
    return this.send('PUT', url, body, headers);
  }

  delete(url: string, headers: Record<string, string> = {}): Promise<HttpResponse> {
    return this.send('DELETE', url, undefined, headers);
  }

  async head(url: string, headers: Record<string, string> = {}): Promise<HttpResponse<undefined>> {
    const merged = this.prepareHeaders(headers);
    debugHttp('HEAD %s init headers=%j', url, redact(merged));
    const start = Date.now();

    try {
      const res = await request(url, { method: 'HEAD', headers: merged, ...this.requestOptions() });
      debugHttp('HEAD %s response status=%d durationMs=%d', url, res.statusCode, Date.now() - start);
      this.logRateLimit('HEAD', url, res.statusCode, res.headers);
      await res.body.dump();

      return { statusCode: res.statusCode, headers: res.headers, body: undefined };
    } catch (err) {
      debugHttp('HEAD %s error: %s', url, errorMessage(err));
      throw err;
    }
  }

  private async send(
    method: Dispatcher.HttpMethod,
    url: string,
    body: unknown,
    headers: Record<string, string>,
  ): Promise<HttpResponse> {
    const merged = this.prepareHeaders(headers);
    const serialized = serializeBody(body, merged);

    debugHttp('%s %s init headers=%j body=%j', method, url, redact(merged), describeBody(serialized));
    const start = Date.now();

    try {
      const res = await request(url, { method, headers: merged, body: serialized, ...this.requestOptions() });
      debugHttp(
        '%s %s response status=%d durationMs=%d content-type=%s',
        method,
        url,
        res.statusCode,
        Date.now() - start,
        res.headers['content-type'],
      );

      this.logRateLimit(method, url, res.statusCode, res.headers);

      const data = await parseResponseBody(res.headers, res.body);
      debugHttp('%s %s response body=%j', method, url, describeParsed(data));

      return { statusCode: res.statusCode, headers: res.headers, body: data };
    } catch (err) {
      debugHttp('%s %s network error: %s', method, url, errorMessage(err));
      throw err;
    }
  }

  private prepareHeaders(headers: Record<string, string>): Record<string, string> {
    const merged = { ...this.options.headers, ...headers };
    const hasUA = Object.keys(merged).some((k) => k.toLowerCase() === 'user-agent');
    if (!hasUA) {
      merged['User-Agent'] = HttpClient.userAgent;
    }
    return merged;
  }

  private requestOptions(): { dispatcher?: Dispatcher; headersTimeout?: number; bodyTimeout?: number } {
    const opts: { dispatcher?: Dispatcher; headersTimeout?: number; bodyTimeout?: number } = {};
    if (this.options.dispatcher) {
      opts.dispatcher = this.options.dispatcher;
    }
    if (this.options.timeoutMs !== undefined) {
      opts.headersTimeout = this.options.timeoutMs;
      opts.bodyTimeout = this.options.timeoutMs;
    }
    return opts;
  }

  private logRateLimit(method: string, url: string, statusCode: number, headers: ResponseHeaders): void {
    if (statusCode === 429 || statusCode === 503) {
      debugHttp(
        'RATE LIMIT DETECTED: %s %s status=%d retry-after=%s',
        method,
        url,
        statusCode,
        headers['retry-after'] ?? 'NOT_SET',
      );
    }
  }
}

/** First value of a header, case-insensitive on the name */
export function headerValue(headers: ResponseHeaders, name: string): string | undefined {
  const raw = headers[name.toLowerCase()];
  return Array.isArray(raw) ? raw[0] : raw;
}

/** Every value of a header, split on commas for Link-style headers */
export function headerValues(headers: ResponseHeaders, name: string): string[] {
  const raw = headers[name.toLowerCase()];
  if (raw === undefined) return [];
  return Array.isArray(raw) ? raw : [raw];
}

function serializeBody(body: unknown, headers: Record<string, string>): RequestBody {
  if (body === undefined || body === null) {
    return null;
  }
  if (typeof body === 'string' || body instanceof Uint8Array) {
    return body;
  }

  const hasContentType = Object.keys(headers).some((k) => k.toLowerCase() === 'content-type');
  if (!hasContentType) {
    headers['Content-Type'] = 'application/json';
  }
  return JSON.stringify(body);
}

async function parseResponseBody(headers: ResponseHeaders, body: Dispatcher.ResponseData['body']): Promise<unknown> {
  const rawCt = headers['content-type'];
  const ct = (Array.isArray(rawCt) ? rawCt[0] : rawCt)?.toLowerCase() ?? '';

  if (ct.includes('json')) {
    const text = await body.text();
    return text.length > 0 ? JSON.parse(text) : undefined;
  }
  if (ct.startsWith('text/') || ct.includes('application/pem-certificate-chain')) {
    return body.text();
  }

  const buf = Buffer.from(await body.arrayBuffer());
  return buf.length > 0 ? buf : undefined;
}

function redact(headers: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    out[key] = key.toLowerCase() === 'authorization' ? '<redacted>' : value;
  }
  return out;
}

function describeBody(body: RequestBody): unknown {
  if (body === null) return { type: 'null' };
  if (typeof body === 'string') {
    return {
      type: 'string',
      length: body.length,
      preview: body.length > 120 ? body.slice(0, 120) + '...' : body,
    };
  }
  return { type: 'bytes', length: body.length };
}

function describeParsed(data: unknown): unknown {
  return Buffer.isBuffer(data) ? { type: 'bytes', length: data.length } : data;
}
