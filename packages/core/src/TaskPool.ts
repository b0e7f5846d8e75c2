import type { PoolStats } from './domain/model/PoolStats.js';
import type { SubmitOptions, WorkFn, WorkItemMetadata } from './domain/model/Task.js';
import type { TaskHandle } from './domain/model/TaskHandle.js';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import type { Logger } from './infrastructure/logging/logger.js';
import { getRootLogger } from './infrastructure/logging/logger.js';
import { DEFAULT_TASK_TIMEOUT_MS, assertValidTimeout } from './domain/services/timeouts.js';
import { EventBus } from './application/EventBus.js';
import { PoolContext } from './application/PoolContext.js';
import { SubmitTask } from './application/usecases/SubmitTask.js';
import { ShutdownPool } from './application/usecases/ShutdownPool.js';
import { WaitForCompletion } from './application/usecases/WaitForCompletion.js';
import { GetPoolStats } from './application/usecases/GetPoolStats.js';

/** Default admission limit. */
export const DEFAULT_POOL_CAPACITY = 50_000;

/** Configuration for a task pool. */
export interface TaskPoolConfig {
  /** Maximum number of tasks in flight at once. Default: `50000`. */
  readonly capacity?: number;
  /**
   * Per-task wall-clock ceiling in milliseconds. `Infinity` disables it.
   * Default: 72 hours. Values above 2^31-1 are rejected.
   */
  readonly timeoutMs?: number;
  /** Logger for pool diagnostics. Default: child of the root logger. */
  readonly logger?: Logger;
  /** Event bus to publish on. Pass a shared bus to observe several components together. */
  readonly eventBus?: EventBus;
}

/**
 * Bounded-concurrency pool for opaque async work items.
 *
 * `submit()` suspends until a slot is free, then runs the work under a timeout.
 * Every handle settles exactly once as `success`, `task_error`, `timeout_error`
 * or (after `shutdown()`) `cancelled`, and its slot is released on every path.
 * Completion order is not submission order.
 *
 * The pool never retries. On timeout the task's `AbortSignal` is aborted and the
 * slot is freed immediately; work that ignores the signal keeps running
 * unobserved.
 *
 * @example
 * ```typescript
 * const pool = new TaskPool({ capacity: 64, timeoutMs: 10 * 60_000 });
 * const handle = await pool.submit((signal) => analyze(path, signal), { identifier: path });
 * const outcome = await handle.result;
 * ```
 */
export class TaskPool {
  private readonly ctx: PoolContext;

  constructor(config: TaskPoolConfig = {}) {
    const logger = config.logger ?? getRootLogger().child({ component: 'task-pool' });
    this.ctx = new PoolContext(
      config.capacity ?? DEFAULT_POOL_CAPACITY,
      assertValidTimeout(config.timeoutMs ?? DEFAULT_TASK_TIMEOUT_MS),
      config.eventBus ?? new EventBus(logger),
      logger,
    );
  }

  /**
   * Submit a work item. Resolves with its handle once the task has a slot and has started.
   *
   * @throws TypeError if `metadata.identifier` is empty.
   * @throws PoolShutdownError if the pool is shut down before a slot is granted.
   */
  submit<T>(work: WorkFn<T>, metadata: WorkItemMetadata, options?: SubmitOptions): Promise<TaskHandle<T>> {
    return new SubmitTask(this.ctx).execute(work, metadata, options);
  }

  /** Snapshot of capacity, occupancy and outcome counters. */
  getStats(): PoolStats {
    return new GetPoolStats(this.ctx).execute();
  }

  /** Identifiers of the tasks currently holding a slot. */
  getInFlight(): readonly string[] {
    return new GetPoolStats(this.ctx).inFlightIdentifiers();
  }

  /** `true` once `shutdown()` has been called. */
  get isClosed(): boolean {
    return this.ctx.closed;
  }

  /**
   * Cancel every in-flight task, reject pending submitters, and resolve once no
   * task holds a slot. Idempotent.
   */
  shutdown(): Promise<void> {
    return new ShutdownPool(this.ctx).execute();
  }

  /** Poll until no task holds a slot, without cancelling anything. Default interval: 60s. */
  waitForCompletion(pollIntervalMs = 60_000): Promise<void> {
    return new WaitForCompletion(this.ctx).execute(pollIntervalMs);
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
