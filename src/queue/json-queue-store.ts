/**
 * json-queue-store.ts
 * Queue snapshots kept in a JSON file
 */

import { JsonFileHandler } from '../config/jsonFileHandler.js';
import { ERROR_MESSAGES } from '../constants/index.js';
import { PersistenceError } from '../errors.js';
import { logger } from '../utils/logger.js';

import type { QueueItem } from './queue-item.js';
import {
  SNAPSHOT_VERSION,
  parseSnapshot,
  type PersistedSnapshot,
  type QueueStore,
} from './queue-store.js';

export interface JsonQueueStoreOptions {
  filePath: string;
  maxBackups?: number;
  now?: () => number;
}

export class JsonQueueStore implements QueueStore {
  private fileHandler: JsonFileHandler;
  private now: () => number;

  constructor(options: JsonQueueStoreOptions) {
    const maxBackups = options.maxBackups ?? 0;
    this.fileHandler = new JsonFileHandler(options.filePath, {
      createBackups: maxBackups > 0,
      maxBackups,
    });
    this.now = options.now ?? Date.now;
  }

  load(): QueueItem[] {
    const raw = this.fileHandler.read();
    if (raw === null) {
      logger.info('No existing queue state found, starting fresh', {
        filePath: this.fileHandler.filePath,
      });
      return [];
    }

    const items = parseSnapshot(raw);
    logger.info(`Loaded queue state: ${items.length} items`, {
      filePath: this.fileHandler.filePath,
    });
    return items;
  }

  save(items: readonly QueueItem[]): void {
    const snapshot: PersistedSnapshot = {
      version: SNAPSHOT_VERSION,
      savedAt: this.now(),
      items: [...items],
    };

    if (!this.fileHandler.write(snapshot)) {
      throw new PersistenceError(ERROR_MESSAGES.PERSISTENCE_WRITE_FAILED(this.fileHandler.filePath));
    }
    logger.debug('Queue state saved', { count: items.length });
  }
}
