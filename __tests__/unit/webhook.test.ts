import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { MockAgent } from 'undici';

import { WebhookNotifier, NoopNotifier, notifyCompleted, type CompletionEvent } from '../../src/lib/notifications/webhook.js';
import { HttpClient } from '../../src/lib/transport/http-client.js';
import { setLogger } from '../../src/lib/utils/logger.js';

const HOOK = 'https://hooks.test';

const event: CompletionEvent = {
  site: { resourceGroup: 'rg', name: 'shop' },
  expiresOn: new Date('2026-06-01T00:00:00Z'),
  dnsNames: ['www.example.com'],
};

describe('WebhookNotifier', () => {
  let agent: MockAgent;
  let warnings: string[];

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
    warnings = [];
    setLogger((message) => warnings.push(message));
  });

  afterEach(async () => {
    setLogger(undefined);
    await agent.close();
  });

  it('posts the completion payload', async () => {
    let sent: unknown;
    agent
      .get(HOOK)
      .intercept({
        path: '/done',
        method: 'POST',
        body: (body: string) => {
          sent = JSON.parse(body);
          return true;
        },
      })
      .reply(204, '');

    await new WebhookNotifier(`${HOOK}/done`, new HttpClient({ dispatcher: agent })).sendCompleted({
      ...event,
      site: { ...event.site, slot: 'staging' },
    });

    expect(sent).toEqual({
      appName: 'shop',
      slotName: 'staging',
      resourceGroup: 'rg',
      result: 'Succeeded',
      expirationDate: '2026-06-01T00:00:00.000Z',
      dnsNames: ['www.example.com'],
    });
  });

  it('reports the production slot when none is set', async () => {
    let slotName: unknown;
    agent
      .get(HOOK)
      .intercept({
        path: '/done',
        method: 'POST',
        body: (body: string) => {
          slotName = Reflect.get(JSON.parse(body), 'slotName');
          return true;
        },
      })
      .reply(200, '');

    await new WebhookNotifier(`${HOOK}/done`, new HttpClient({ dispatcher: agent })).sendCompleted(event);

    expect(slotName).toBe('production');
  });

  it('raises on a non-2xx answer', async () => {
    agent.get(HOOK).intercept({ path: '/done', method: 'POST' }).reply(500, '');

    await expect(
      new WebhookNotifier(`${HOOK}/done`, new HttpClient({ dispatcher: agent })).sendCompleted(event),
    ).rejects.toThrow('Webhook https://hooks.test/done answered 500');
  });

  it('logs delivery failures instead of raising', async () => {
    agent.get(HOOK).intercept({ path: '/done', method: 'POST' }).reply(502, '');

    await expect(
      notifyCompleted(new WebhookNotifier(`${HOOK}/done`, new HttpClient({ dispatcher: agent })), event),
    ).resolves.toBeUndefined();
    expect(warnings).toEqual(['WARN: Completion notification failed: Webhook https://hooks.test/done answered 502']);
  });

  it('sends nothing without a webhook', async () => {
    await expect(notifyCompleted(new NoopNotifier(), event)).resolves.toBeUndefined();
    expect(warnings).toEqual([]);
  });
});
