import { z, type ZodType, type ZodTypeDef } from 'zod';

import { HttpClient, type HttpClientOptions, type HttpResponse } from '../../transport/http-client.js';
import { ControlPlaneRequestError } from '../../errors/workflow-errors.js';
import type { ControlPlaneResult } from '../hosting.js';
import { debugDeploy } from '../../utils/debug.js';

export interface ArmClientOptions {
  /** Resource manager base URL, e.g. `https://management.azure.com` */
  baseUrl: string;
  subscriptionId: string;
  /** Bearer token for the resource manager (and the site's SCM endpoint) */
  token: string;
  http?: Omit<HttpClientOptions, 'headers'>;
}

const DETAIL_LIMIT = 300;

/** `{ value: [...], nextLink? }` page of a list operation */
function pageSchema<T>(item: ZodType<T, ZodTypeDef, unknown>) {
  return z.object({
    value: z.array(item),
    nextLink: z.string().nullish(),
  });
}

export function describeBody(body: unknown): string | undefined {
  if (body === undefined) return undefined;
  const text = typeof body === 'string' ? body : Buffer.isBuffer(body) ? body.toString('utf8') : JSON.stringify(body);
  return text.length > DETAIL_LIMIT ? `${text.slice(0, DETAIL_LIMIT)}...` : text;
}

/** Resource group segment of a resource id */
export function resourceGroupOf(resourceId: string): string {
  const match = /\/resourceGroups\/([^/]+)/i.exec(resourceId);
  return match?.[1] ?? '';
}

/**
 * Minimal resource-manager REST client: bearer auth, api-version query,
 * nextLink paging and zod-validated reads
 */
export class ArmClient {
  readonly subscriptionId: string;
  private readonly baseUrl: string;
  private readonly http: HttpClient;

  constructor(opts: ArmClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.subscriptionId = opts.subscriptionId;
    this.http = new HttpClient({ ...opts.http, headers: { Authorization: `Bearer ${opts.token}` } });
  }

  get subscriptionPath(): string {
    return `/subscriptions/${this.subscriptionId}`;
  }

  url(path: string, apiVersion: string): string {
    const base = path.startsWith('https://') ? path : `${this.baseUrl}${path}`;
    const url = new URL(base);
    url.searchParams.set('api-version', apiVersion);
    return url.toString();
  }

  /** GET a single resource; `undefined` on 404 */
  async get<T>(path: string, apiVersion: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T | undefined> {
    const target = this.url(path, apiVersion);
    const res = await this.http.get(target);
    if (res.statusCode === 404) return undefined;
    return this.parse('GET', target, res, schema);
  }

  /** GET every page of a list operation */
  async list<T>(path: string, apiVersion: string, item: ZodType<T, ZodTypeDef, unknown>): Promise<T[]> {
    const items: T[] = [];
    const schema = pageSchema(item);
    let next: string | undefined = this.url(path, apiVersion);

    while (next) {
      const res = await this.http.get(next);
      const page: z.infer<typeof schema> = this.parse('GET', next, res, schema);
      items.push(...page.value);
      next = page.nextLink ?? undefined;
    }

    debugDeploy('listed %d item(s) from %s', items.length, path);
    return items;
  }

  async put(path: string, apiVersion: string, body: unknown): Promise<ControlPlaneResult> {
    const target = this.url(path, apiVersion);
    const payload = JSON.stringify(body);
    const res = await this.http.put(target, payload, { 'Content-Type': 'application/json; charset=utf-8' });
    debugDeploy('PUT %s: payload length %d, status %d', target, payload.length, res.statusCode);
    return toResult(res, target, payload.length);
  }

  async delete(path: string, apiVersion: string): Promise<ControlPlaneResult> {
    const target = this.url(path, apiVersion);
    const res = await this.http.delete(target);
    return toResult(res, target, 0);
  }

  /** Raw request against another host sharing the bearer token (SCM) */
  async send(method: 'PUT' | 'DELETE', url: string, body?: string, headers: Record<string, string> = {}): Promise<ControlPlaneResult> {
    const res =
      method === 'PUT'
        ? await this.http.put(url, body ?? '', headers)
        : await this.http.delete(url, headers);
    return toResult(res, url, body?.length ?? 0);
  }

  private parse<T>(method: string, target: string, res: HttpResponse, schema: ZodType<T, ZodTypeDef, unknown>): T {
    if (res.statusCode < 200 || res.statusCode >= 300) {
      throw new ControlPlaneRequestError(method, target, res.statusCode, describeBody(res.body));
    }

    const parsed = schema.safeParse(res.body);
    if (!parsed.success) {
      throw new ControlPlaneRequestError(method, target, res.statusCode, `unexpected response: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}

function toResult(res: HttpResponse, target: string, payloadSize: number): ControlPlaneResult {
  const ok = res.statusCode >= 200 && res.statusCode < 300;
  return { statusCode: res.statusCode, target, payloadSize, detail: ok ? undefined : describeBody(res.body) };
}
