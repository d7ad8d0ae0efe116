/**
 * queue-store.ts
 * Persistence contract for queue snapshots, plus the restore rules applied on load
 */

import { z } from 'zod';

import { logger } from '../utils/logger.js';

import { isTerminal, resetOrphan, type QueueItem } from './queue-item.js';

export const SNAPSHOT_VERSION = 1;

export interface PersistedSnapshot {
  version: number;
  savedAt: number;
  items: QueueItem[];
}

/**
 * Durable storage for the full ordered item list.
 * `load` returns items as saved; the manager applies `restoreItems` itself.
 * `save` must replace the previous snapshot atomically and throw `PersistenceError` on failure.
 */
export interface QueueStore {
  load(): QueueItem[];
  save(items: readonly QueueItem[]): void;
}

/**
 * Tolerant item schema: unknown fields are stripped, fields added after a snapshot
 * was written fall back to safe defaults.
 */
const persistedItemSchema = z.object({
  id: z.string().min(1),
  sequence: z.number().int().default(0),
  requester: z.string(),
  payload: z.string(),
  origin: z.record(z.unknown()).catch({}),
  state: z.enum(['queued', 'processing', 'completed', 'failed']),
  submittedAt: z.number(),
  startedAt: z.number().optional().catch(undefined),
  finishedAt: z.number().optional().catch(undefined),
  result: z.string().optional().catch(undefined),
  errorDetail: z.string().optional().catch(undefined),
  initialPosition: z.number().int().min(0).catch(0),
  startingNotified: z.boolean().catch(false),
});

const snapshotEnvelopeSchema = z.object({
  version: z.number().int().optional(),
  items: z.array(z.unknown()).catch([]),
});

/**
 * Parse a raw snapshot document. Entries that fail validation are skipped and logged.
 */
export function parseSnapshot(raw: unknown): QueueItem[] {
  if (raw === null || raw === undefined) {
    return [];
  }

  const envelope = snapshotEnvelopeSchema.safeParse(raw);
  if (!envelope.success) {
    logger.warn('Queue snapshot has an unrecognised layout, starting empty');
    return [];
  }

  const items: QueueItem[] = [];
  const seen = new Set<string>();
  for (const entry of envelope.data.items) {
    const parsed = persistedItemSchema.safeParse(entry);
    if (!parsed.success) {
      logger.warn('Skipping unreadable queue item in snapshot', {
        issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
      });
      continue;
    }
    if (seen.has(parsed.data.id)) {
      logger.warn(`Skipping duplicate queue item ${parsed.data.id} in snapshot`);
      continue;
    }
    seen.add(parsed.data.id);
    items.push(parsed.data);
  }
  return items;
}

/**
 * Apply restart rules to loaded items:
 * - items left `processing` go back to `queued`, ahead of everything else
 * - terminal items past their retention window are dropped
 * - everything else keeps the order it was saved in, which is queue order
 */
export function restoreItems(items: QueueItem[], now: number, retentionMs: number): QueueItem[] {
  const orphans: QueueItem[] = [];
  const rest: QueueItem[] = [];
  let purged = 0;

  for (const item of items) {
    if (item.state === 'processing') {
      resetOrphan(item);
      orphans.push(item);
      continue;
    }
    if (isTerminal(item) && (item.finishedAt ?? item.submittedAt) + retentionMs <= now) {
      purged++;
      continue;
    }
    rest.push(item);
  }

  if (orphans.length > 0) {
    logger.warn(`Requeued ${orphans.length} orphaned item(s) at the front of the queue`, {
      ids: orphans.map(item => item.id),
    });
  }
  if (purged > 0) {
    logger.info(`Purged ${purged} expired item(s) from snapshot`);
  }

  return [...orphans, ...rest];
}

/**
 * Keeps the snapshot in memory; used when persistence is disabled
 */
export class MemoryQueueStore implements QueueStore {
  private snapshot: QueueItem[] = [];
  saveCount = 0;

  constructor(initial: QueueItem[] = []) {
    this.snapshot = initial.map(item => ({ ...item }));
  }

  load(): QueueItem[] {
    return this.snapshot.map(item => ({ ...item }));
  }

  save(items: readonly QueueItem[]): void {
    this.snapshot = items.map(item => ({ ...item }));
    this.saveCount++;
  }
}
