import type { TaskTimeoutError, WorkItemFailedError, TaskCancelledError } from '../errors/BatchPoolError.js';

/**
 * Deferred computation run by the pool.
 *
 * The signal is aborted when the task times out or the pool shuts down. Work that
 * ignores it keeps running in the background; its result is discarded.
 */
export type WorkFn<T> = (signal: AbortSignal) => Promise<T>;

/** Caller-supplied label for a work item. The pool never interprets `payloadRef`. */
export interface WorkItemMetadata {
  /** Non-empty identifier used for reporting and checkpointing. */
  readonly identifier: string;
  /** Opaque reference to the payload, e.g. a file path. */
  readonly payloadRef?: string;
}

/** Per-submission overrides. */
export interface SubmitOptions {
  /** Overrides the pool-wide `timeoutMs` for this task. */
  readonly timeoutMs?: number;
}

interface TaskResultBase {
  readonly taskId: number;
  readonly identifier: string;
  readonly payloadRef?: string;
  /** Wall-clock time from slot admission to the terminal outcome. */
  readonly durationMs: number;
}

export interface TaskSuccess<T> extends TaskResultBase {
  readonly status: 'success';
  readonly value: T;
}

export interface TaskFailure extends TaskResultBase {
  readonly status: 'task_error';
  readonly error: WorkItemFailedError;
  readonly message: string;
  /** Stack trace of the original error, when it had one. */
  readonly trace?: string;
}

export interface TaskTimeout extends TaskResultBase {
  readonly status: 'timeout_error';
  readonly error: TaskTimeoutError;
  readonly message: string;
}

export interface TaskCancellation extends TaskResultBase {
  readonly status: 'cancelled';
  readonly error: TaskCancelledError;
  readonly message: string;
}

/** Discriminated union of every terminal outcome. Narrow on `status`. */
export type TaskResult<T> = TaskSuccess<T> | TaskFailure | TaskTimeout | TaskCancellation;
