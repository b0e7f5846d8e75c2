/** Format version written to every checkpoint. */
export const CHECKPOINT_VERSION = '1.0';

/** Outcome reported for an identifier. */
export const ItemOutcome = {
  COMPLETED: 'completed',
  FAILED: 'failed',
} as const;

export type ItemOutcome = (typeof ItemOutcome)[keyof typeof ItemOutcome];

/**
 * Full persisted progress state. Always written and replaced as a whole.
 *
 * Times are epoch milliseconds in memory; stores convert to whatever their
 * format requires.
 */
export interface CheckpointRecord {
  readonly completed: readonly string[];
  readonly failed: readonly string[];
  readonly totalFiles: number;
  readonly startTime: number;
  readonly lastUpdate: number;
  readonly version: string;
}

/** Progress counters derived from the checkpoint state. */
export interface ProgressStats {
  readonly completedCount: number;
  readonly failedCount: number;
  /** `completedCount + failedCount`. */
  readonly processedCount: number;
  readonly totalFiles: number;
  readonly remainingCount: number;
  /** Completed share of processed items (0–100). */
  readonly successRate: number;
  /** Processed share of `totalFiles` (0–100). */
  readonly progressPercentage: number;
  readonly elapsedMs: number;
  /** `elapsedMs / processedCount * remainingCount`, or `0` before anything is processed. */
  readonly estimatedRemainingMs: number;
}

/** Identifier sets returned by `CheckpointManager.load()`. */
export interface LoadedProgress {
  readonly completed: Set<string>;
  readonly failed: Set<string>;
}
