/**
 * webhook-notifier.ts
 * Posts lifecycle notifications to an HTTP endpoint that relays them to the requester
 */

import type { QueueOrigin } from '../queue/queue-item.js';
import { fetchWithTimeout } from '../utils/fetchWithTimeout.js';
import { logger } from '../utils/logger.js';

import { renderMessages } from './messages.js';
import type { NotificationArgs, NotificationPort } from './notification-port.js';

export interface WebhookNotifierOptions {
  url: string;
  timeoutMs?: number;
  maxMessageLength?: number;
}

export class WebhookNotifier implements NotificationPort {
  private url: string;
  private timeoutMs: number;
  private maxMessageLength: number;

  constructor(options: WebhookNotifierOptions) {
    this.url = options.url;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.maxMessageLength = options.maxMessageLength ?? 2000;
  }

  async notify(origin: QueueOrigin, ...args: NotificationArgs): Promise<void> {
    const [kind, payload] = args;
    const response = await fetchWithTimeout(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        kind,
        origin,
        payload,
        messages: renderMessages(this.maxMessageLength, ...args),
      }),
      timeout: this.timeoutMs,
    });

    if (!response.ok) {
      throw new Error(`Webhook responded with HTTP ${response.status}: ${response.statusText}`);
    }

    logger.debug(`Delivered ${kind} notification`, { itemId: payload.itemId });
  }
}
