/**
 * in-memory-notifier.ts
 * Records deliveries instead of sending them; used by tests and local runs
 */

import type { QueueOrigin } from '../queue/queue-item.js';

import type {
  NotificationArgs,
  NotificationKind,
  NotificationPayload,
  NotificationPort,
} from './notification-port.js';

export interface Delivery {
  origin: QueueOrigin;
  kind: NotificationKind;
  payload: NotificationPayload;
}

export class InMemoryNotifier implements NotificationPort {
  readonly deliveries: Delivery[] = [];
  /** When set, every delivery is recorded and then rejected with this error */
  failWith?: Error;

  async notify(origin: QueueOrigin, ...args: NotificationArgs): Promise<void> {
    const [kind, payload] = args;
    this.deliveries.push({ origin, kind, payload });
    if (this.failWith) {
      throw this.failWith;
    }
  }

  ofKind(kind: NotificationKind): Delivery[] {
    return this.deliveries.filter(delivery => delivery.kind === kind);
  }

  /**
   * Item ids that received `kind`, in delivery order
   */
  itemIds(kind: NotificationKind): string[] {
    return this.ofKind(kind).map(delivery => delivery.payload.itemId);
  }

  clear(): void {
    this.deliveries.length = 0;
  }
}
