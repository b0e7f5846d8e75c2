import type { PoolStats, ProgressStats, TaskStatus } from '@batchpool/core';

/** A work item that did not succeed, as written to the error log. */
export interface FailureRecord {
  readonly identifier: string;
  readonly payloadRef?: string;
  readonly status: Exclude<TaskStatus, 'success'>;
  readonly message: string;
  /** Epoch milliseconds at which the outcome was recorded. */
  readonly timestamp: number;
}

/** Result of one `BatchRunner.run()` call. */
export interface RunSummary {
  /** Items seen in the input, skipped ones included. */
  readonly total: number;
  /** Items skipped because the checkpoint already marks them completed. */
  readonly skipped: number;
  readonly submitted: number;
  readonly succeeded: number;
  /** Task errors and timeouts. */
  readonly failed: number;
  /** Subset of `failed` that hit the task timeout. */
  readonly timedOut: number;
  /** Tasks cancelled by `abort()`. Recorded as failed in the checkpoint. */
  readonly cancelled: number;
  readonly elapsedMs: number;
  /** `true` when `abort()` stopped the run early. */
  readonly aborted: boolean;
  readonly pool: PoolStats;
  readonly progress: ProgressStats;
  readonly failures: readonly FailureRecord[];
}
