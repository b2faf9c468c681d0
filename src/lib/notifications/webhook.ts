import type { HttpClient } from '../transport/http-client.js';
import type { SiteRef } from '../types/domain.js';
import { debugNotify } from '../utils/debug.js';
import { logWarn } from '../utils/logger.js';
import { errorMessage } from '../utils/index.js';

export interface CompletionEvent {
  site: SiteRef;
  expiresOn: Date;
  dnsNames: string[];
}

export interface CompletionNotifier {
  sendCompleted(event: CompletionEvent): Promise<void>;
}

/**
 * POSTs the completion event as JSON
 */
export class WebhookNotifier implements CompletionNotifier {
  constructor(
    private readonly url: string,
    private readonly http: HttpClient,
  ) {}

  async sendCompleted(event: CompletionEvent): Promise<void> {
    const payload = {
      appName: event.site.name,
      slotName: event.site.slot ?? 'production',
      resourceGroup: event.site.resourceGroup,
      result: 'Succeeded',
      expirationDate: event.expiresOn.toISOString(),
      dnsNames: event.dnsNames,
    };

    const res = await this.http.post(this.url, payload);
    if (res.statusCode < 200 || res.statusCode >= 300) {
      throw new Error(`Webhook ${this.url} answered ${res.statusCode}`);
    }
    debugNotify('completion event sent for %s', event.site.name);
  }
}

export class NoopNotifier implements CompletionNotifier {
  async sendCompleted(event: CompletionEvent): Promise<void> {
    debugNotify('no webhook configured; completion of %s not sent', event.site.name);
  }
}

/** Delivery failures are logged, never raised */
export async function notifyCompleted(notifier: CompletionNotifier, event: CompletionEvent): Promise<void> {
  try {
    await notifier.sendCompleted(event);
  } catch (err) {
    logWarn(`Completion notification failed: ${errorMessage(err)}`);
  }
}
