import type { ProgressStats } from '../model/Checkpoint.js';
import type { PoolStats } from '../model/PoolStats.js';

/** Emitted once a task has been admitted to a slot and started. */
export interface TaskSubmittedEvent {
  readonly type: 'task:submitted';
  readonly taskId: number;
  readonly identifier: string;
  readonly inFlight: number;
  readonly timestamp: number;
}

/** Emitted when a task's computation returns before its timeout. */
export interface TaskCompletedEvent {
  readonly type: 'task:completed';
  readonly taskId: number;
  readonly identifier: string;
  readonly durationMs: number;
  readonly timestamp: number;
}

/** Emitted when a task's computation throws or rejects. */
export interface TaskFailedEvent {
  readonly type: 'task:failed';
  readonly taskId: number;
  readonly identifier: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted when a task is still running after its timeout elapsed. */
export interface TaskTimeoutEvent {
  readonly type: 'task:timeout';
  readonly taskId: number;
  readonly identifier: string;
  readonly timeoutMs: number;
  readonly timestamp: number;
}

/** Emitted for each in-flight task cancelled by `shutdown()`. */
export interface TaskCancelledEvent {
  readonly type: 'task:cancelled';
  readonly taskId: number;
  readonly identifier: string;
  readonly timestamp: number;
}

/** Emitted once `shutdown()` has drained the pool. */
export interface PoolShutdownEvent {
  readonly type: 'pool:shutdown';
  readonly cancelledCount: number;
  readonly stats: PoolStats;
  readonly timestamp: number;
}

/** Emitted after a checkpoint was read successfully. */
export interface CheckpointLoadedEvent {
  readonly type: 'checkpoint:loaded';
  readonly location: string;
  readonly completedCount: number;
  readonly failedCount: number;
  readonly totalFiles: number;
  readonly timestamp: number;
}

/** Emitted after each successful persist. */
export interface CheckpointSavedEvent {
  readonly type: 'checkpoint:saved';
  readonly location: string;
  readonly progress: ProgressStats;
  readonly timestamp: number;
}

/** Emitted when a persisted checkpoint was unreadable and the run starts fresh. */
export interface CheckpointCorruptEvent {
  readonly type: 'checkpoint:corrupt';
  readonly location: string;
  readonly error: string;
  readonly timestamp: number;
}

/** Emitted after `reset()` removed the persisted checkpoint. */
export interface CheckpointResetEvent {
  readonly type: 'checkpoint:reset';
  readonly location: string;
  readonly timestamp: number;
}

/** Discriminated union of all domain events. */
export type DomainEvent =
  | TaskSubmittedEvent
  | TaskCompletedEvent
  | TaskFailedEvent
  | TaskTimeoutEvent
  | TaskCancelledEvent
  | PoolShutdownEvent
  | CheckpointLoadedEvent
  | CheckpointSavedEvent
  | CheckpointCorruptEvent
  | CheckpointResetEvent;

/** String literal union of all event type names. */
export type EventType = DomainEvent['type'];

/** Extract the payload type for a specific event type. */
export type EventPayload<T extends EventType> = Extract<DomainEvent, { type: T }>;
