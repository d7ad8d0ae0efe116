/**
 * status-reporter.ts
 * Read-only views of queue state for status commands and the HTTP API
 */

import { formatWaitTime } from '../notifications/messages.js';

import { isActive, type QueueItemState } from './queue-item.js';
import type { QueueCounters, QueueManager } from './queue-manager.js';

export interface QueueSnapshot {
  /** Items waiting to be processed */
  queueSize: number;
  isProcessing: boolean;
  currentItemId?: string;
  capacity: number;
  /** Every item still tracked, including finished ones inside the retention window */
  activeItemCount: number;
  counters: QueueCounters;
  persistenceHealthy: boolean;
}

export interface UserStatus {
  itemId: string;
  state: QueueItemState;
  position: number;
  estimatedWaitMs: number;
}

type StatusSource = Pick<QueueManager, 'getState' | 'position' | 'estimatedWait'>;

export class StatusReporter {
  constructor(private readonly source: StatusSource) {}

  snapshot(): QueueSnapshot {
    const state = this.source.getState();
    const snapshot: QueueSnapshot = {
      queueSize: state.items.filter(item => item.state === 'queued').length,
      isProcessing: state.currentItemId !== undefined,
      capacity: state.capacity,
      activeItemCount: state.items.length,
      counters: state.counters,
      persistenceHealthy: state.persistenceHealthy,
    };
    if (state.currentItemId !== undefined) {
      snapshot.currentItemId = state.currentItemId;
    }
    return snapshot;
  }

  /**
   * Status of the requester's earliest active item, or null when they have none
   */
  userStatus(requester: string): UserStatus | null {
    const item = this.source
      .getState()
      .items.find(candidate => candidate.requester === requester && isActive(candidate));
    if (!item) {
      return null;
    }

    const position = this.source.position(item.id);
    return {
      itemId: item.id,
      state: item.state,
      position,
      estimatedWaitMs: this.source.estimatedWait(position),
    };
  }

  describeWait(ms: number): string {
    return formatWaitTime(ms);
  }
}
