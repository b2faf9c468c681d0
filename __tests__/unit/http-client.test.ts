import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { MockAgent } from 'undici';

import { HttpClient, headerValue, headerValues } from '../../src/lib/transport/http-client.js';

const ORIGIN = 'https://api.test';

describe('HttpClient', () => {
  let agent: MockAgent;
  let http: HttpClient;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    http = new HttpClient({ dispatcher: agent, headers: { Authorization: 'Bearer test-token' } });
  });

  afterEach(async () => {
    await agent.close();
  });

  it('parses JSON bodies', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/json', method: 'GET' })
      .reply(200, { ok: true }, { headers: { 'content-type': 'application/json; charset=utf-8' } });

    const res = await http.get(`${ORIGIN}/json`);

    expect(res.statusCode).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  it('returns text for text and PEM responses', async () => {
    const pool = agent.get(ORIGIN);
    pool.intercept({ path: '/text', method: 'GET' }).reply(200, 'token.value', { headers: { 'content-type': 'text/plain' } });
    pool
      .intercept({ path: '/cert', method: 'GET' })
      .reply(200, '-----BEGIN CERTIFICATE-----', { headers: { 'content-type': 'application/pem-certificate-chain' } });

    await expect(http.get(`${ORIGIN}/text`)).resolves.toMatchObject({ body: 'token.value' });
    await expect(http.get(`${ORIGIN}/cert`)).resolves.toMatchObject({ body: '-----BEGIN CERTIFICATE-----' });
  });

  it('returns bytes for other content and nothing for an empty body', async () => {
    const pool = agent.get(ORIGIN);
    pool
      .intercept({ path: '/bin', method: 'GET' })
      .reply(200, Buffer.from([1, 2, 3]), { headers: { 'content-type': 'application/octet-stream' } });
    pool.intercept({ path: '/empty', method: 'DELETE' }).reply(204, '');

    const bin = await http.get(`${ORIGIN}/bin`);
    expect(Buffer.isBuffer(bin.body)).toBe(true);
    expect(bin.body).toEqual(Buffer.from([1, 2, 3]));

    await expect(http.delete(`${ORIGIN}/empty`)).resolves.toMatchObject({ statusCode: 204, body: undefined });
  });

  it('sends objects as JSON with the default headers', async () => {
    agent
      .get(ORIGIN)
      .intercept({
        path: '/items',
        method: 'POST',
        body: '{"name":"a"}',
        headers: {
          'content-type': 'application/json',
          authorization: 'Bearer test-token',
          'user-agent': (value: string) => value.startsWith('sitecert/'),
        },
      })
      .reply(201, '');

    await expect(http.post(`${ORIGIN}/items`, { name: 'a' })).resolves.toMatchObject({ statusCode: 201 });
  });

  it('keeps a caller content type and string body', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/raw', method: 'PUT', body: 'plain', headers: { 'content-type': 'text/plain' } })
      .reply(200, '');

    await expect(http.put(`${ORIGIN}/raw`, 'plain', { 'Content-Type': 'text/plain' })).resolves.toMatchObject({
      statusCode: 200,
    });
  });

  it('reads headers from a HEAD request', async () => {
    agent
      .get(ORIGIN)
      .intercept({ path: '/nonce', method: 'HEAD' })
      .reply(200, '', { headers: { 'replay-nonce': 'nonce-1' } });

    const res = await http.head(`${ORIGIN}/nonce`);

    expect(res.body).toBeUndefined();
    expect(headerValue(res.headers, 'Replay-Nonce')).toBe('nonce-1');
  });
});

describe('header helpers', () => {
  it('reads single and repeated values', () => {
    const headers = { link: ['<https://a.test>;rel="up"', '<https://b.test>;rel="alternate"'], location: '/x' };

    expect(headerValue(headers, 'Link')).toBe('<https://a.test>;rel="up"');
    expect(headerValues(headers, 'location')).toEqual(['/x']);
    expect(headerValues(headers, 'link')).toHaveLength(2);
    expect(headerValues(headers, 'retry-after')).toEqual([]);
  });
});
