/**
 * error-messages.ts
 * Standardized error messages used across the codebase
 */

export const ERROR_MESSAGES = {
  // Submission errors
  PAYLOAD_EMPTY: 'Query must not be empty',
  PAYLOAD_TOO_LONG: (max: number, actual: number) =>
    `Query must be at most ${max} characters (got ${actual})`,
  REQUESTER_REQUIRED: 'requester is required',
  QUEUE_FULL: (capacity: number) => `Queue is full (${capacity} active requests), try again later`,

  // Lookup errors
  ITEM_NOT_FOUND: (id: string) => `Queue item '${id}' not found`,
  REQUESTER_NOT_QUEUED: (requester: string) => `Requester '${requester}' has no active request`,

  // Processing errors
  ANALYSIS_TIMEOUT: (ms: number) => `Analysis timed out after ${ms}ms`,
  ANALYSIS_FAILED: (detail: string) => `Analysis failed: ${detail}`,
  INVALID_TRANSITION: (id: string, from: string, to: string) =>
    `Queue item '${id}' cannot move from ${from} to ${to}`,

  // Persistence errors
  PERSISTENCE_WRITE_FAILED: (path: string) => `Failed to write queue state to ${path}`,

  // Generic errors
  INTERNAL_SERVER_ERROR: 'Internal server error',
  NOT_FOUND: 'Not found',
} as const;
