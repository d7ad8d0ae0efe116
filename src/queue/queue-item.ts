/**
 * queue-item.ts
 * One analysis request and its lifecycle state
 */

import { InvalidTransitionError } from '../errors.js';

export type QueueItemState = 'queued' | 'processing' | 'completed' | 'failed';

/**
 * Delivery context supplied by the submitter (channel, conversation, callback).
 * The queue stores it and hands it back to the notifier without reading it.
 */
export type QueueOrigin = Record<string, unknown>;

export interface QueueItem {
  id: string;
  /** Submission order; breaks ties between equal timestamps */
  sequence: number;
  requester: string;
  payload: string;
  origin: QueueOrigin;
  state: QueueItemState;
  submittedAt: number;
  startedAt?: number;
  finishedAt?: number;
  result?: string;
  errorDetail?: string;
  /** Position at submission time; 0 means the requester was never told to wait */
  initialPosition: number;
  startingNotified: boolean;
}

const ALLOWED_TRANSITIONS: Record<QueueItemState, readonly QueueItemState[]> = {
  queued: ['processing'],
  processing: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export function isTerminal(item: Pick<QueueItem, 'state'>): boolean {
  return item.state === 'completed' || item.state === 'failed';
}

export function isActive(item: Pick<QueueItem, 'state'>): boolean {
  return item.state === 'queued' || item.state === 'processing';
}

function assertTransition(item: QueueItem, to: QueueItemState): void {
  if (!ALLOWED_TRANSITIONS[item.state].includes(to)) {
    throw new InvalidTransitionError(item.id, item.state, to);
  }
}

export function markProcessing(item: QueueItem, now: number): void {
  assertTransition(item, 'processing');
  item.state = 'processing';
  item.startedAt = now;
}

export function markCompleted(item: QueueItem, result: string, now: number): void {
  assertTransition(item, 'completed');
  item.state = 'completed';
  item.result = result;
  item.errorDetail = undefined;
  item.finishedAt = now;
}

export function markFailed(item: QueueItem, errorDetail: string, now: number): void {
  assertTransition(item, 'failed');
  item.state = 'failed';
  item.errorDetail = errorDetail;
  item.result = undefined;
  item.finishedAt = now;
}

/**
 * Put an item left in `processing` by a dead process back into the queue.
 * This is the only path out of `processing` that does not end in a terminal state.
 */
export function resetOrphan(item: QueueItem): void {
  if (item.state !== 'processing') {
    throw new InvalidTransitionError(item.id, item.state, 'queued');
  }
  item.state = 'queued';
  item.startedAt = undefined;
}

/**
 * Copy handed to callers so they cannot mutate queue state
 */
export function cloneItem(item: QueueItem): QueueItem {
  return { ...item, origin: { ...item.origin } };
}

/**
 * Milliseconds the item spent in `processing`, when it has finished
 */
export function processingTime(item: QueueItem): number | undefined {
  if (item.startedAt === undefined || item.finishedAt === undefined) {
    return undefined;
  }
  return item.finishedAt - item.startedAt;
}
