/**
 * queue-manager.ts
 * FIFO request queue with a single background worker
 *
 * Every mutation and the snapshot write that follows it run without an `await`
 * in between. Node runs them to completion before any other caller gets a turn,
 * so that synchronous section is the queue's lock. The analysis call is awaited
 * outside it, with the item already marked `processing`.
 */

import { randomUUID } from 'crypto';

import type { AnalysisOperation } from '../analysis/analysis-operation.js';
import { DEFAULT_QUEUE_CONFIG, type QueueConfig } from '../config/schema.js';
import { ERROR_MESSAGES } from '../constants/index.js';
import { AnalysisTimeoutError, CapacityError, NotFoundError, ValidationError } from '../errors.js';
import { previewPayload } from '../notifications/messages.js';
import type { NotificationArgs, NotificationPort } from '../notifications/notification-port.js';
import { sleep, withTimeout } from '../utils/async-helpers.js';
import { getErrorMessage } from '../utils/error-helpers.js';
import { logger } from '../utils/logger.js';

import {
  cloneItem,
  isActive,
  isTerminal,
  markCompleted,
  markFailed,
  markProcessing,
  processingTime,
  type QueueItem,
  type QueueOrigin,
} from './queue-item.js';
import { restoreItems, type QueueStore } from './queue-store.js';
import { WakeSignal } from './wake-signal.js';

export interface QueueCounters {
  submitted: number;
  rejected: number;
  cancelled: number;
  completed: number;
  failed: number;
}

/**
 * Point-in-time copy of the manager's state
 */
export interface QueueState {
  items: QueueItem[];
  currentItemId?: string;
  capacity: number;
  counters: QueueCounters;
  persistenceHealthy: boolean;
}

export interface QueueManagerOptions {
  store: QueueStore;
  notifier: NotificationPort;
  analysis: AnalysisOperation;
  config?: Partial<QueueConfig>;
  now?: () => number;
  generateId?: () => string;
}

type Outcome = { state: 'completed'; result: string } | { state: 'failed'; errorDetail: string };

const defaultGenerateId = (): string => randomUUID().slice(0, 8);

export class QueueManager {
  private items: QueueItem[];
  private currentItemId?: string;
  private nextSequence: number;
  private config: QueueConfig;
  private store: QueueStore;
  private notifier: NotificationPort;
  private analysis: AnalysisOperation;
  private now: () => number;
  private generateId: () => string;

  private wake = new WakeSignal();
  private loop?: Promise<void>;
  private stopping = false;
  private cleanupTimers = new Map<string, NodeJS.Timeout>();
  private idleWaiters = new Set<() => void>();
  private pendingDeliveries = new Set<Promise<void>>();
  private persistenceHealthy = true;
  private counters: QueueCounters = {
    submitted: 0,
    rejected: 0,
    cancelled: 0,
    completed: 0,
    failed: 0,
  };

  constructor(options: QueueManagerOptions) {
    this.config = { ...DEFAULT_QUEUE_CONFIG, ...options.config };
    this.store = options.store;
    this.notifier = options.notifier;
    this.analysis = options.analysis;
    this.now = options.now ?? Date.now;
    this.generateId = options.generateId ?? defaultGenerateId;

    this.items = restoreItems(this.store.load(), this.now(), this.config.retentionMs);
    this.nextSequence = this.items.reduce((max, item) => Math.max(max, item.sequence), 0) + 1;
  }

  /**
   * Add a request to the back of the queue.
   * @throws ValidationError for an empty or over-long query, or a missing requester
   * @throws CapacityError when the number of active items has reached the configured maximum
   */
  submit(requester: string, payload: string, origin: QueueOrigin = {}): QueueItem {
    this.validateSubmission(requester, payload);

    const activeCount = this.activeCount();
    if (activeCount >= this.config.maxQueueSize) {
      this.counters.rejected++;
      logger.warn(`Queue full, rejecting query from ${requester}`, {
        capacity: this.config.maxQueueSize,
      });
      throw new CapacityError(this.config.maxQueueSize);
    }

    // Every active item is ahead of a newly appended one
    const position = activeCount;
    const item: QueueItem = {
      id: this.uniqueId(),
      sequence: this.nextSequence++,
      requester,
      payload,
      origin: { ...origin },
      state: 'queued',
      submittedAt: this.now(),
      initialPosition: position,
      startingNotified: false,
    };

    this.items.push(item);
    this.counters.submitted++;
    this.persist();

    logger.info('Request queued', {
      itemId: item.id,
      requester,
      position,
      queueSize: this.activeCount(),
    });

    if (position > 0) {
      this.dispatch(item, 'queued', {
        itemId: item.id,
        requester,
        position,
        estimatedWaitMs: this.estimatedWait(position),
      });
    }

    this.wake.notify();
    return cloneItem(item);
  }

  /**
   * Number of active items ahead of the given one; 0 while it is processing
   * @throws NotFoundError for unknown ids
   */
  position(itemId: string): number {
    const index = this.items.findIndex(item => item.id === itemId);
    if (index === -1) {
      throw new NotFoundError(ERROR_MESSAGES.ITEM_NOT_FOUND(itemId));
    }
    return this.positionAt(index);
  }

  /**
   * Advisory only
   */
  estimatedWait(position: number): number {
    return position * this.config.averageProcessingTimeMs;
  }

  /**
   * Remove a queued item owned by `requester`. Returns false, without error, for anything
   * that cannot be cancelled (unknown, someone else's, already processing or finished).
   */
  cancel(itemId: string, requester: string): boolean {
    const index = this.items.findIndex(item => item.id === itemId);
    const item = index === -1 ? undefined : this.items[index];
    if (!item || item.state !== 'queued' || item.requester !== requester) {
      logger.debug('Cancel request ignored', { itemId, requester, state: item?.state });
      return false;
    }

    this.items.splice(index, 1);
    this.counters.cancelled++;
    const nowAtFront = this.collectStartingNotices();
    this.persist();

    logger.info('Request cancelled', { itemId, requester, queueSize: this.activeCount() });

    this.dispatchStartingNotices(nowAtFront);
    this.settleIdleWaiters();
    return true;
  }

  getItem(itemId: string): QueueItem | undefined {
    const item = this.items.find(candidate => candidate.id === itemId);
    return item ? cloneItem(item) : undefined;
  }

  getState(): QueueState {
    return {
      items: this.items.map(cloneItem),
      currentItemId: this.currentItemId,
      capacity: this.config.maxQueueSize,
      counters: { ...this.counters },
      persistenceHealthy: this.persistenceHealthy,
    };
  }

  isRunning(): boolean {
    return this.loop !== undefined;
  }

  /**
   * Start the background worker. Calling it again while running does nothing.
   */
  start(): void {
    if (this.loop) {
      return;
    }
    this.stopping = false;
    for (const item of this.items) {
      if (isTerminal(item)) {
        this.scheduleCleanup(item);
      }
    }
    this.loop = this.runLoop().finally(() => {
      this.loop = undefined;
    });
    logger.info('Queue processor started');
  }

  /**
   * Let the in-flight item finish or time out, stop the worker, and write a final snapshot
   */
  async stop(): Promise<void> {
    this.stopping = true;
    this.wake.notify();
    if (this.loop) {
      await this.loop;
    }

    for (const timer of this.cleanupTimers.values()) {
      clearTimeout(timer);
    }
    this.cleanupTimers.clear();

    await Promise.allSettled([...this.pendingDeliveries]);
    this.persist();
    logger.info('Queue manager shutdown complete');
  }

  /**
   * Resolves true once no item is queued or processing, false if `timeoutMs` passes first
   */
  drain(timeoutMs: number): Promise<boolean> {
    if (this.activeCount() === 0) {
      return Promise.resolve(true);
    }
    return new Promise(resolve => {
      const onIdle = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.idleWaiters.delete(onIdle);
        resolve(false);
      }, timeoutMs);
      this.idleWaiters.add(onIdle);
    });
  }

  /**
   * Wait for notifications already handed to the notifier
   */
  async flushNotifications(): Promise<void> {
    await Promise.allSettled([...this.pendingDeliveries]);
  }

  private async runLoop(): Promise<void> {
    while (!this.stopping) {
      try {
        const item = this.claimNext();
        if (!item) {
          await this.wake.wait();
          continue;
        }
        await this.processItem(item);
      } catch (error) {
        logger.error('Queue processor error', { error: getErrorMessage(error) });
        await sleep(this.config.loopErrorBackoffMs);
      }
    }
    logger.info('Queue processor stopped');
  }

  private claimNext(): QueueItem | undefined {
    if (this.currentItemId !== undefined) {
      return undefined;
    }
    const item = this.items.find(candidate => candidate.state === 'queued');
    if (!item) {
      return undefined;
    }

    markProcessing(item, this.now());
    this.currentItemId = item.id;
    // Requesters who were told to wait hear once that their turn has come
    const announce = item.initialPosition > 0 && !item.startingNotified;
    if (announce) {
      item.startingNotified = true;
    }
    this.persist();

    logger.info('Starting to process query', {
      itemId: item.id,
      requester: item.requester,
      waitTime: (item.startedAt ?? item.submittedAt) - item.submittedAt,
    });

    if (announce) {
      this.dispatch(item, 'starting', { itemId: item.id, requester: item.requester });
    }
    return item;
  }

  private async processItem(item: QueueItem): Promise<void> {
    const timeoutMs = this.config.analysisTimeoutMs;
    const controller = new AbortController();

    let outcome: Outcome;
    try {
      const result = await withTimeout(
        this.analysis.run(item.payload, { timeoutMs, signal: controller.signal }),
        timeoutMs,
        () => new AnalysisTimeoutError(timeoutMs)
      );
      outcome = { state: 'completed', result };
    } catch (error) {
      if (error instanceof AnalysisTimeoutError) {
        controller.abort();
      }
      outcome = { state: 'failed', errorDetail: getErrorMessage(error) };
    }

    this.finish(item, outcome);
  }

  private finish(item: QueueItem, outcome: Outcome): void {
    try {
      if (outcome.state === 'completed') {
        markCompleted(item, outcome.result, this.now());
        this.counters.completed++;
      } else {
        markFailed(item, outcome.errorDetail, this.now());
        this.counters.failed++;
      }
    } finally {
      this.currentItemId = undefined;
    }

    const nowAtFront = this.collectStartingNotices();
    this.persist();

    const elapsed = processingTime(item) ?? 0;
    if (outcome.state === 'completed') {
      logger.info('Query processed successfully', { itemId: item.id, processingTime: elapsed });
      this.dispatch(item, 'completed', {
        itemId: item.id,
        requester: item.requester,
        result: outcome.result,
        processingTimeMs: elapsed,
      });
    } else {
      logger.error('Query processing failed', { itemId: item.id, error: outcome.errorDetail });
      this.dispatch(item, 'failed', {
        itemId: item.id,
        requester: item.requester,
        errorDetail: outcome.errorDetail,
        payloadPreview: previewPayload(item.payload),
      });
    }

    this.dispatchStartingNotices(nowAtFront);
    this.scheduleCleanup(item);
    this.settleIdleWaiters();
  }

  /**
   * Flag queued items that just reached the front. Called inside a mutation, before the
   * snapshot is written, so the flag is persisted before the notice goes out.
   */
  private collectStartingNotices(): QueueItem[] {
    const reached: QueueItem[] = [];
    this.items.forEach((item, index) => {
      if (
        item.state === 'queued' &&
        item.initialPosition > 0 &&
        !item.startingNotified &&
        this.positionAt(index) === 0
      ) {
        item.startingNotified = true;
        reached.push(item);
      }
    });
    return reached;
  }

  private dispatchStartingNotices(items: QueueItem[]): void {
    for (const item of items) {
      this.dispatch(item, 'starting', { itemId: item.id, requester: item.requester });
    }
  }

  private dispatch(item: QueueItem, ...args: NotificationArgs): void {
    let delivery: Promise<void>;
    try {
      delivery = this.notifier.notify({ ...item.origin }, ...args);
    } catch (error) {
      delivery = Promise.reject(error);
    }

    const tracked = delivery.catch((error: unknown) => {
      logger.error(`Failed to send ${args[0]} notification`, {
        itemId: item.id,
        error: getErrorMessage(error),
      });
    });
    this.pendingDeliveries.add(tracked);
    void tracked.finally(() => this.pendingDeliveries.delete(tracked));
  }

  private scheduleCleanup(item: QueueItem): void {
    if (this.cleanupTimers.has(item.id)) {
      return;
    }
    const finishedAt = item.finishedAt ?? this.now();
    const delay = Math.max(0, finishedAt + this.config.retentionMs - this.now());
    const timer = setTimeout(() => this.purge(item.id), delay);
    timer.unref();
    this.cleanupTimers.set(item.id, timer);
  }

  private purge(itemId: string): void {
    this.cleanupTimers.delete(itemId);
    const index = this.items.findIndex(item => item.id === itemId);
    if (index === -1 || !isTerminal(this.items[index])) {
      return;
    }
    this.items.splice(index, 1);
    this.persist();
    logger.debug(`Cleaned up queue item: ${itemId}`);
  }

  private persist(): void {
    try {
      this.store.save(this.items);
      if (!this.persistenceHealthy) {
        logger.info('Queue state persistence recovered');
      }
      this.persistenceHealthy = true;
    } catch (error) {
      this.persistenceHealthy = false;
      logger.error('Failed to persist queue state, continuing without durability', {
        error: getErrorMessage(error),
      });
    }
  }

  private positionAt(index: number): number {
    const target = this.items[index];
    if (target.state === 'processing') {
      return 0;
    }
    let ahead = 0;
    for (let i = 0; i < index; i++) {
      if (isActive(this.items[i])) {
        ahead++;
      }
    }
    return ahead;
  }

  private activeCount(): number {
    return this.items.filter(isActive).length;
  }

  private settleIdleWaiters(): void {
    if (this.activeCount() > 0) {
      return;
    }
    for (const resolve of this.idleWaiters) {
      resolve();
    }
    this.idleWaiters.clear();
  }

  private validateSubmission(requester: string, payload: string): void {
    if (requester.trim().length === 0) {
      throw new ValidationError(ERROR_MESSAGES.REQUESTER_REQUIRED);
    }
    if (payload.trim().length === 0) {
      throw new ValidationError(ERROR_MESSAGES.PAYLOAD_EMPTY);
    }
    if (payload.length > this.config.maxPayloadLength) {
      throw new ValidationError(
        ERROR_MESSAGES.PAYLOAD_TOO_LONG(this.config.maxPayloadLength, payload.length)
      );
    }
  }

  private uniqueId(): string {
    let id = this.generateId();
    while (this.items.some(item => item.id === id)) {
      id = this.generateId();
    }
    return id;
  }
}
