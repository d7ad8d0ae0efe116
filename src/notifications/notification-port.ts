/**
 * notification-port.ts
 * Sink the queue calls to tell a requester about lifecycle changes
 */

import type { QueueOrigin } from '../queue/queue-item.js';

export interface NotificationPayloads {
  queued: { itemId: string; requester: string; position: number; estimatedWaitMs: number };
  starting: { itemId: string; requester: string };
  completed: { itemId: string; requester: string; result: string; processingTimeMs: number };
  failed: { itemId: string; requester: string; errorDetail: string; payloadPreview: string };
}

export type NotificationKind = keyof NotificationPayloads;

export type NotificationPayload = NotificationPayloads[NotificationKind];

/**
 * `[kind, payload]` pairs; destructuring narrows the payload by kind.
 */
export type NotificationArgs = {
  [K in NotificationKind]: [kind: K, payload: NotificationPayloads[K]];
}[NotificationKind];

/**
 * Delivery is fire-and-forget for the queue: a rejected promise is logged by the caller
 * and never undoes the state change that triggered it.
 */
export interface NotificationPort {
  notify(origin: QueueOrigin, ...args: NotificationArgs): Promise<void>;
}
