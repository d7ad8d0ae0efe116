/**
 * analysis-operation.ts
 * The long-running unit of work the queue runs one at a time
 */

export interface AnalysisRunOptions {
  timeoutMs: number;
  /** Aborted when the queue gives up on the run */
  signal: AbortSignal;
}

/**
 * May retry or call out to other services internally; the queue only sees
 * a resolved result or a rejection.
 */
export interface AnalysisOperation {
  run(query: string, options: AnalysisRunOptions): Promise<string>;
}
