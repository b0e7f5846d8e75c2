import { CheckpointManager, EventBus, TaskPool, getRootLogger } from '@batchpool/core';
import type { DomainEvent, EventPayload, EventType, Logger } from '@batchpool/core';
import type { RunSummary } from './domain/model/RunSummary.js';
import type { ItemProcessor, RunOptions } from './domain/model/RunOptions.js';
import { ErrorLogWriter } from './infrastructure/ErrorLogWriter.js';
import { RunnerContext } from './application/RunnerContext.js';
import { RunBatch } from './application/usecases/RunBatch.js';
import { AbortRun } from './application/usecases/AbortRun.js';

/**
 * Configuration for a batch runner.
 *
 * Accepts the output of `loadRunnerConfig()` as is.
 */
export interface BatchRunnerConfig {
  /** Pool capacity. Ignored when `pool` is given. */
  readonly concurrency?: number;
  /** Per-item timeout. Ignored when `pool` is given. */
  readonly taskTimeoutMs?: number;
  /** Ignored when `checkpoint` is given. */
  readonly checkpointFile?: string;
  /** Ignored when `checkpoint` is given. */
  readonly autoSaveInterval?: number;
  /** Where to write the JSONL error log. No log is written when unset. */
  readonly errorLogPath?: string;
  /** Process items the checkpoint marks completed. Default: `false`. */
  readonly forceRerun?: boolean;
  readonly pool?: TaskPool;
  readonly checkpoint?: CheckpointManager;
  readonly logger?: Logger;
  /** Shared by the pool and checkpoint this runner creates. */
  readonly eventBus?: EventBus;
}

/**
 * Resumable batch runner.
 *
 * Composes a `TaskPool` and a `CheckpointManager`: completed items from earlier
 * runs are skipped, every outcome is recorded, and the checkpoint is saved once
 * more when the run ends. Items that failed are retried on the next run.
 *
 * @example
 * ```typescript
 * const runner = new BatchRunner(loadRunnerConfig());
 * const summary = await runner.run(imagePaths, (path, signal) => scoreImage(path, signal));
 * ```
 */
export class BatchRunner {
  private readonly ctx: RunnerContext;
  private readonly eventBus: EventBus;

  constructor(config: BatchRunnerConfig = {}) {
    const logger = config.logger ?? getRootLogger().child({ component: 'batch-runner' });
    this.eventBus = config.eventBus ?? new EventBus(logger);

    this.ctx = new RunnerContext(
      config.pool ??
        new TaskPool({
          capacity: config.concurrency,
          timeoutMs: config.taskTimeoutMs,
          logger: logger.child({ component: 'task-pool' }),
          eventBus: this.eventBus,
        }),
      config.checkpoint ??
        new CheckpointManager({
          checkpointFile: config.checkpointFile,
          autoSaveInterval: config.autoSaveInterval,
          logger: logger.child({ component: 'checkpoint' }),
          eventBus: this.eventBus,
        }),
      logger,
      config.forceRerun ?? false,
      config.errorLogPath ? new ErrorLogWriter(config.errorLogPath) : null,
    );
  }

  /**
   * Process every item not already completed and return a summary.
   *
   * @throws PersistenceFailedError if the checkpoint could not be saved; thrown after all tasks settled.
   * @throws Error if another run is in progress on this runner.
   */
  run<TItem, TResult>(
    items: Iterable<TItem> | AsyncIterable<TItem>,
    processor: ItemProcessor<TItem, TResult>,
    options: RunOptions<TItem> = {},
  ): Promise<RunSummary> {
    return new RunBatch(this.ctx, processor, options).execute(items);
  }

  /**
   * Stop the current run: no further items are submitted and in-flight ones are
   * cancelled and recorded as failed. Resolves once the pool is empty. The
   * runner cannot run again afterwards.
   */
  abort(): Promise<void> {
    return new AbortRun(this.ctx).execute();
  }

  get pool(): TaskPool {
    return this.ctx.pool;
  }

  get checkpoint(): CheckpointManager {
    return this.ctx.checkpoint;
  }

  /**
   * Subscribe to events from the pool and checkpoint this runner created.
   * Components passed in through config publish on their own bus.
   */
  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }
}
