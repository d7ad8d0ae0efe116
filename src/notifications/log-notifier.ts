/**
 * log-notifier.ts
 * Fallback notifier when no webhook is configured
 */

import type { QueueOrigin } from '../queue/queue-item.js';
import { logger } from '../utils/logger.js';

import { renderMessages } from './messages.js';
import type { NotificationArgs, NotificationPort } from './notification-port.js';

export class LogNotifier implements NotificationPort {
  constructor(private readonly maxMessageLength = 2000) {}

  async notify(origin: QueueOrigin, ...args: NotificationArgs): Promise<void> {
    const [kind, payload] = args;
    logger.info(`Notification ${kind}`, {
      itemId: payload.itemId,
      requester: payload.requester,
      origin,
      messages: renderMessages(this.maxMessageLength, ...args),
    });
  }
}
