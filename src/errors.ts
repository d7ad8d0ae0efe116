/**
 * errors.ts
 * Error taxonomy for the request queue
 */

import { ERROR_MESSAGES } from './constants/index.js';

export type QueueErrorCode =
  | 'VALIDATION_ERROR'
  | 'QUEUE_FULL'
  | 'NOT_FOUND'
  | 'ANALYSIS_TIMEOUT'
  | 'ANALYSIS_FAILED'
  | 'PERSISTENCE_FAILED'
  | 'INVALID_TRANSITION';

export class QueueError extends Error {
  readonly code: QueueErrorCode;

  constructor(code: QueueErrorCode, message: string) {
    super(message);
    this.code = code;
    this.name = 'QueueError';
  }
}

/**
 * Bad input, rejected before anything enters the queue
 */
export class ValidationError extends QueueError {
  constructor(message: string) {
    super('VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}

export class CapacityError extends QueueError {
  readonly capacity: number;

  constructor(capacity: number) {
    super('QUEUE_FULL', ERROR_MESSAGES.QUEUE_FULL(capacity));
    this.capacity = capacity;
    this.name = 'CapacityError';
  }
}

export class NotFoundError extends QueueError {
  constructor(message: string) {
    super('NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

export class AnalysisTimeoutError extends QueueError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('ANALYSIS_TIMEOUT', ERROR_MESSAGES.ANALYSIS_TIMEOUT(timeoutMs));
    this.timeoutMs = timeoutMs;
    this.name = 'AnalysisTimeoutError';
  }
}

export class AnalysisError extends QueueError {
  constructor(detail: string) {
    super('ANALYSIS_FAILED', ERROR_MESSAGES.ANALYSIS_FAILED(detail));
    this.name = 'AnalysisError';
  }
}

/**
 * Snapshot write failure. The queue keeps running in memory without durability.
 */
export class PersistenceError extends QueueError {
  constructor(message: string, cause?: unknown) {
    super('PERSISTENCE_FAILED', message);
    if (cause !== undefined) {
      this.cause = cause;
    }
    this.name = 'PersistenceError';
  }
}

export class InvalidTransitionError extends QueueError {
  constructor(id: string, from: string, to: string) {
    super('INVALID_TRANSITION', ERROR_MESSAGES.INVALID_TRANSITION(id, from, to));
    this.name = 'InvalidTransitionError';
  }
}
