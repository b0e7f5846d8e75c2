/** Error codes carried by every error the pool and checkpoint layer raise. */
export const ErrorCode = {
  TIMEOUT_EXCEEDED: 'TIMEOUT_EXCEEDED',
  WORK_ITEM_FAILED: 'WORK_ITEM_FAILED',
  TASK_CANCELLED: 'TASK_CANCELLED',
  POOL_SHUT_DOWN: 'POOL_SHUT_DOWN',
  PERSISTENCE_FAILED: 'PERSISTENCE_FAILED',
  PERSISTENCE_CORRUPT: 'PERSISTENCE_CORRUPT',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/** Base class for all batchpool errors. Narrow on `code` or with `instanceof`. */
export abstract class BatchPoolError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A work item did not settle within its timeout. */
export class TaskTimeoutError extends BatchPoolError {
  readonly code = ErrorCode.TIMEOUT_EXCEEDED;

  constructor(
    readonly identifier: string,
    readonly timeoutMs: number,
  ) {
    super(`Task '${identifier}' exceeded timeout of ${String(timeoutMs)}ms`);
  }
}

/** The wrapped computation threw or rejected. The original error is kept as `cause`. */
export class WorkItemFailedError extends BatchPoolError {
  readonly code = ErrorCode.WORK_ITEM_FAILED;

  constructor(
    readonly identifier: string,
    cause: unknown,
  ) {
    super(`Task '${identifier}' failed: ${describeError(cause)}`, { cause });
  }
}

/** The task was cancelled by `TaskPool.shutdown()` before it settled. */
export class TaskCancelledError extends BatchPoolError {
  readonly code = ErrorCode.TASK_CANCELLED;

  constructor(readonly identifier: string) {
    super(`Task '${identifier}' was cancelled by pool shutdown`);
  }
}

/** Thrown by `submit()` once the pool has been shut down. */
export class PoolShutdownError extends BatchPoolError {
  readonly code = ErrorCode.POOL_SHUT_DOWN;

  constructor() {
    super('Task pool has been shut down');
  }
}

/** A checkpoint could not be written (or removed). Surfaced to the caller. */
export class PersistenceFailedError extends BatchPoolError {
  readonly code = ErrorCode.PERSISTENCE_FAILED;

  constructor(
    readonly location: string,
    cause: unknown,
  ) {
    super(`Failed to persist checkpoint at '${location}': ${describeError(cause)}`, { cause });
  }
}

/** A persisted checkpoint could not be read or does not match the expected format. */
export class PersistenceCorruptError extends BatchPoolError {
  readonly code = ErrorCode.PERSISTENCE_CORRUPT;

  constructor(
    readonly location: string,
    cause: unknown,
  ) {
    super(`Checkpoint at '${location}' is unreadable: ${describeError(cause)}`, { cause });
  }
}

/** Message of an unknown thrown value. */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
