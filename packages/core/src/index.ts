// Main entry points
export { TaskPool, DEFAULT_POOL_CAPACITY } from './TaskPool.js';
export type { TaskPoolConfig } from './TaskPool.js';
export { CheckpointManager, DEFAULT_AUTO_SAVE_INTERVAL } from './CheckpointManager.js';
export type { CheckpointManagerConfig } from './CheckpointManager.js';

// Domain model
export type {
  WorkFn,
  WorkItemMetadata,
  SubmitOptions,
  TaskResult,
  TaskSuccess,
  TaskFailure,
  TaskTimeout,
  TaskCancellation,
} from './domain/model/Task.js';
export { TaskHandle } from './domain/model/TaskHandle.js';
export { TaskStatus, isFailureStatus } from './domain/model/TaskStatus.js';
export type { PoolStats } from './domain/model/PoolStats.js';
export type { CheckpointRecord, ProgressStats, LoadedProgress } from './domain/model/Checkpoint.js';
export { ItemOutcome, CHECKPOINT_VERSION } from './domain/model/Checkpoint.js';

// Errors
export {
  BatchPoolError,
  ErrorCode,
  TaskTimeoutError,
  WorkItemFailedError,
  TaskCancelledError,
  PoolShutdownError,
  PersistenceFailedError,
  PersistenceCorruptError,
  describeError,
} from './domain/errors/BatchPoolError.js';

// Domain services
export { Semaphore } from './domain/services/Semaphore.js';
export { DEFAULT_TASK_TIMEOUT_MS, MAX_TIMEOUT_MS, assertValidTimeout } from './domain/services/timeouts.js';

// Application internals (for @batchpool/runner and other extension packages)
export { EventBus } from './application/EventBus.js';

// Ports (for custom implementations)
export type { CheckpointStore } from './domain/ports/CheckpointStore.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  TaskSubmittedEvent,
  TaskCompletedEvent,
  TaskFailedEvent,
  TaskTimeoutEvent,
  TaskCancelledEvent,
  PoolShutdownEvent,
  CheckpointLoadedEvent,
  CheckpointSavedEvent,
  CheckpointCorruptEvent,
  CheckpointResetEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters
export { FileCheckpointStore, DEFAULT_CHECKPOINT_FILE, nodeFileSystem } from './infrastructure/state/FileCheckpointStore.js';
export type { FileCheckpointStoreOptions, CheckpointFileSystem } from './infrastructure/state/FileCheckpointStore.js';
export { InMemoryCheckpointStore } from './infrastructure/state/InMemoryCheckpointStore.js';
export { CheckpointFileSchema, parseCheckpoint, serializeCheckpoint } from './infrastructure/state/CheckpointFileMapper.js';
export type { CheckpointFile } from './infrastructure/state/CheckpointFileMapper.js';
export { createLogger, getRootLogger } from './infrastructure/logging/logger.js';
export type { Logger, LoggerOptions } from './infrastructure/logging/logger.js';
