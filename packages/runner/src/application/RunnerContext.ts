import type { CheckpointManager, Logger, TaskPool } from '@batchpool/core';
import type { ErrorLogWriter } from '../infrastructure/ErrorLogWriter.js';

/**
 * State shared by the runner's use cases.
 *
 * Internal class. The pool and checkpoint outlive a single run; `aborted` is
 * permanent because `abort()` shuts the pool down.
 */
export class RunnerContext {
  running = false;
  aborted = false;

  constructor(
    readonly pool: TaskPool,
    readonly checkpoint: CheckpointManager,
    readonly logger: Logger,
    readonly forceRerun: boolean,
    readonly errorLog: ErrorLogWriter | null,
  ) {}
}
