import type { ItemOutcome, LoadedProgress, ProgressStats } from './domain/model/Checkpoint.js';
import type { CheckpointStore } from './domain/ports/CheckpointStore.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { Logger } from './infrastructure/logging/logger.js';
import { getRootLogger } from './infrastructure/logging/logger.js';
import { FileCheckpointStore } from './infrastructure/state/FileCheckpointStore.js';
import { EventBus } from './application/EventBus.js';
import { CheckpointContext } from './application/CheckpointContext.js';
import { LoadCheckpoint } from './application/usecases/LoadCheckpoint.js';
import { SaveCheckpoint, assertTotalFiles } from './application/usecases/SaveCheckpoint.js';
import { UpdateProgress } from './application/usecases/UpdateProgress.js';
import { GetProgress } from './application/usecases/GetProgress.js';
import { ResetCheckpoint } from './application/usecases/ResetCheckpoint.js';

/** Default number of recorded outcomes between automatic saves. */
export const DEFAULT_AUTO_SAVE_INTERVAL = 100;

/** Configuration for a checkpoint manager. */
export interface CheckpointManagerConfig {
  /** Persistence adapter. Default: `FileCheckpointStore` at `checkpointFile`. */
  readonly store?: CheckpointStore;
  /** Checkpoint path used when no `store` is given. Default: `'.batchpool/checkpoint.json'`. */
  readonly checkpointFile?: string;
  /** Outcomes recorded between automatic saves. Default: `100`. */
  readonly autoSaveInterval?: number;
  readonly logger?: Logger;
  /** Event bus to publish on. Pass a shared bus to observe several components together. */
  readonly eventBus?: EventBus;
  /** Time source in epoch milliseconds. Default: `Date.now`. */
  readonly clock?: () => number;
}

/**
 * Crash-consistent record of which identifiers completed or failed.
 *
 * Holds two disjoint identifier sets in memory and persists them through a
 * `CheckpointStore`, always as a full snapshot. Knows nothing about concurrency
 * or the task pool; an orchestrator reports outcomes to it.
 *
 * @example
 * ```typescript
 * const checkpoint = new CheckpointManager({ checkpointFile: 'out/checkpoint.json' });
 * await checkpoint.load();
 * if (!checkpoint.shouldSkip(path)) {
 *   // ... process, then:
 *   await checkpoint.updateProgress(path, 'completed');
 * }
 * await checkpoint.flush();
 * ```
 */
export class CheckpointManager {
  private readonly ctx: CheckpointContext;

  constructor(config: CheckpointManagerConfig = {}) {
    const logger = config.logger ?? getRootLogger().child({ component: 'checkpoint' });
    const autoSaveInterval = config.autoSaveInterval ?? DEFAULT_AUTO_SAVE_INTERVAL;
    if (!Number.isInteger(autoSaveInterval) || autoSaveInterval < 1) {
      throw new RangeError(`autoSaveInterval must be a positive integer, got ${String(autoSaveInterval)}`);
    }
    const clock = config.clock ?? Date.now;

    this.ctx = new CheckpointContext(
      config.store ?? new FileCheckpointStore({ path: config.checkpointFile, logger, clock }),
      autoSaveInterval,
      config.eventBus ?? new EventBus(logger),
      logger,
      clock,
    );
  }

  /** Where the checkpoint is persisted. */
  get location(): string {
    return this.ctx.store.location;
  }

  /**
   * Restore progress from the store and return copies of both sets.
   *
   * A missing or unreadable checkpoint yields empty sets; this never rejects for
   * read or parse failures.
   */
  load(): Promise<LoadedProgress> {
    return new LoadCheckpoint(this.ctx).execute();
  }

  /**
   * Replace the tracked sets with copies of `completed` and `failed` and persist
   * them atomically.
   *
   * @throws PersistenceFailedError if the write fails; the previous checkpoint is left intact.
   */
  save(completed: Iterable<string>, failed: Iterable<string>, totalFiles?: number): Promise<void> {
    return new SaveCheckpoint(this.ctx).execute(completed, failed, totalFiles);
  }

  /**
   * Persist the currently tracked state.
   *
   * @throws PersistenceFailedError if the write fails.
   */
  flush(): Promise<void> {
    return new SaveCheckpoint(this.ctx).flush();
  }

  /**
   * Record an identifier's outcome, evicting it from the opposite set.
   *
   * @throws PersistenceFailedError if this call triggered an automatic save that failed.
   */
  updateProgress(identifier: string, outcome: ItemOutcome, autoSave = true): Promise<void> {
    return new UpdateProgress(this.ctx).execute(identifier, outcome, autoSave);
  }

  /** `true` when the identifier already completed and `forceRerun` is not set. */
  shouldSkip(identifier: string, forceRerun = false): boolean {
    return new GetProgress(this.ctx).shouldSkip(identifier, forceRerun);
  }

  /** Counters, percentages, elapsed time and ETA. */
  getProgressStats(): ProgressStats {
    return new GetProgress(this.ctx).execute();
  }

  /** Set the denominator used for progress and ETA. Not persisted until the next save. */
  setTotalFiles(totalFiles: number): void {
    assertTotalFiles(totalFiles);
    this.ctx.totalFiles = totalFiles;
  }

  /** Copy of the completed identifiers. */
  getCompleted(): Set<string> {
    return new GetProgress(this.ctx).completed();
  }

  /** Copy of the failed identifiers. */
  getFailed(): Set<string> {
    return new GetProgress(this.ctx).failed();
  }

  /** Outcomes recorded since the last successful save. */
  getUnsavedCount(): number {
    return this.ctx.unsavedCount;
  }

  /**
   * Delete the persisted checkpoint and clear all tracked state.
   *
   * @throws PersistenceFailedError if the file could not be removed.
   */
  reset(): Promise<void> {
    return new ResetCheckpoint(this.ctx).execute();
  }

  /** Subscribe to a lifecycle event. Returns `this` for chaining. */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.ctx.eventBus.on(type, handler);
    return this;
  }

  /** Subscribe to all events regardless of type. Returns `this` for chaining. */
  onAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.onAny(handler);
    return this;
  }

  /** Unsubscribe a wildcard handler previously registered with `onAny()`. */
  offAny(handler: (event: DomainEvent) => void): this {
    this.ctx.eventBus.offAny(handler);
    return this;
  }
}
