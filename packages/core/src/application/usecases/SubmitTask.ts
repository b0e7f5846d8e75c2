import type { SubmitOptions, TaskResult, WorkFn, WorkItemMetadata } from '../../domain/model/Task.js';
import { TaskHandle } from '../../domain/model/TaskHandle.js';
import {
  PoolShutdownError,
  TaskCancelledError,
  TaskTimeoutError,
  WorkItemFailedError,
  describeError,
} from '../../domain/errors/BatchPoolError.js';
import { assertValidTimeout } from '../../domain/services/timeouts.js';
import type { PoolContext } from '../PoolContext.js';

/** What the race between the work, the timer and the cancel signal produced. */
type Settled<T> =
  | { readonly kind: 'value'; readonly value: T }
  | { readonly kind: 'error'; readonly error: unknown }
  | { readonly kind: 'timeout' }
  | { readonly kind: 'cancelled' };

interface RunningTask<T> {
  readonly handle: TaskHandle<T>;
  readonly resolveOutcome: (outcome: TaskResult<T>) => void;
  readonly work: WorkFn<T>;
  readonly timeoutMs: number;
  readonly startedAt: number;
  readonly controller: AbortController;
  readonly cancellation: Promise<void>;
}

/** Use case: wait for a slot, then run a work item under its timeout. */
export class SubmitTask {
  constructor(private readonly ctx: PoolContext) {}

  async execute<T>(work: WorkFn<T>, metadata: WorkItemMetadata, options?: SubmitOptions): Promise<TaskHandle<T>> {
    if (typeof metadata.identifier !== 'string' || metadata.identifier.length === 0) {
      throw new TypeError('Work item metadata requires a non-empty identifier');
    }
    const timeoutMs = assertValidTimeout(options?.timeoutMs ?? this.ctx.timeoutMs);

    if (this.ctx.closed) throw new PoolShutdownError();
    await this.ctx.semaphore.acquire();
    if (this.ctx.closed) {
      this.ctx.semaphore.release();
      throw new PoolShutdownError();
    }

    const taskId = this.ctx.nextTaskId++;
    let resolveOutcome: (outcome: TaskResult<T>) => void = () => undefined;
    const handle = new TaskHandle<T>(
      taskId,
      metadata,
      new Promise<TaskResult<T>>((resolve) => {
        resolveOutcome = resolve;
      }),
    );
    const controller = new AbortController();
    let signalCancel: () => void = () => undefined;
    const cancellation = new Promise<void>((resolve) => {
      signalCancel = resolve;
    });

    const task: RunningTask<T> = {
      handle,
      resolveOutcome,
      work,
      timeoutMs,
      startedAt: Date.now(),
      controller,
      cancellation,
    };

    // run() cannot reach its cleanup before the first await, so registering after it starts is safe.
    const finished = this.run(task);
    this.ctx.register({
      taskId,
      identifier: metadata.identifier,
      startedAt: task.startedAt,
      cancel: () => {
        // Settle the race before abort listeners can reject the work.
        signalCancel();
        controller.abort(new TaskCancelledError(metadata.identifier));
      },
      finished,
    });

    this.ctx.eventBus.emit({
      type: 'task:submitted',
      taskId,
      identifier: metadata.identifier,
      inFlight: this.ctx.inFlight.size,
      timestamp: Date.now(),
    });

    return handle;
  }

  private async run<T>(task: RunningTask<T>): Promise<void> {
    let outcome: TaskResult<T>;
    try {
      outcome = await this.race(task);
    } catch (error) {
      outcome = this.failure(task, error);
    } finally {
      this.ctx.unregister(task.handle.taskId);
    }
    this.finish(task, outcome);
  }

  private async race<T>(task: RunningTask<T>): Promise<TaskResult<T>> {
    const work = Promise.resolve()
      .then(() => task.work(task.controller.signal))
      .then(
        (value): Settled<T> => ({ kind: 'value', value }),
        (error: unknown): Settled<T> => ({ kind: 'error', error }),
      );

    const contenders: Promise<Settled<T>>[] = [
      work,
      task.cancellation.then((): Settled<T> => ({ kind: 'cancelled' })),
    ];

    let timer: ReturnType<typeof setTimeout> | undefined;
    if (Number.isFinite(task.timeoutMs)) {
      contenders.push(
        new Promise<Settled<T>>((resolve) => {
          timer = setTimeout(() => {
            resolve({ kind: 'timeout' });
          }, task.timeoutMs);
        }),
      );
    }

    try {
      const settled = await Promise.race(contenders);
      switch (settled.kind) {
        case 'value':
          return { ...this.base(task), status: 'success', value: settled.value };
        case 'error':
          return this.failure(task, settled.error);
        case 'timeout': {
          const error = new TaskTimeoutError(task.handle.identifier, task.timeoutMs);
          task.controller.abort(error);
          this.observeAbandoned(task, work);
          return { ...this.base(task), status: 'timeout_error', error, message: error.message };
        }
        case 'cancelled': {
          const error = new TaskCancelledError(task.handle.identifier);
          this.observeAbandoned(task, work);
          return { ...this.base(task), status: 'cancelled', error, message: error.message };
        }
      }
    } finally {
      if (timer !== undefined) clearTimeout(timer);
    }
  }

  private failure<T>(task: RunningTask<T>, cause: unknown): TaskResult<T> {
    return {
      ...this.base(task),
      status: 'task_error',
      error: new WorkItemFailedError(task.handle.identifier, cause),
      message: describeError(cause),
      trace: cause instanceof Error ? cause.stack : undefined,
    };
  }

  private base<T>(task: RunningTask<T>): {
    taskId: number;
    identifier: string;
    payloadRef?: string;
    durationMs: number;
  } {
    return {
      taskId: task.handle.taskId,
      identifier: task.handle.identifier,
      payloadRef: task.handle.payloadRef,
      durationMs: Date.now() - task.startedAt,
    };
  }

  /** The slot is already free; the computation is left to finish on its own. */
  private observeAbandoned<T>(task: RunningTask<T>, work: Promise<Settled<T>>): void {
    void work.then((settled) => {
      this.ctx.logger.debug(
        { taskId: task.handle.taskId, identifier: task.handle.identifier, lateOutcome: settled.kind },
        'Abandoned task settled after its slot was released',
      );
    });
  }

  private finish<T>(task: RunningTask<T>, outcome: TaskResult<T>): void {
    this.ctx.recordOutcome(outcome.status);
    task.resolveOutcome(outcome);

    const { taskId, identifier } = outcome;
    const timestamp = Date.now();
    switch (outcome.status) {
      case 'success':
        this.ctx.eventBus.emit({ type: 'task:completed', taskId, identifier, durationMs: outcome.durationMs, timestamp });
        break;
      case 'task_error':
        this.ctx.logger.warn({ taskId, identifier, err: outcome.error.cause }, 'Task failed');
        this.ctx.eventBus.emit({ type: 'task:failed', taskId, identifier, error: outcome.message, timestamp });
        break;
      case 'timeout_error':
        this.ctx.logger.warn({ taskId, identifier, timeoutMs: task.timeoutMs }, 'Task timed out');
        this.ctx.eventBus.emit({ type: 'task:timeout', taskId, identifier, timeoutMs: task.timeoutMs, timestamp });
        break;
      case 'cancelled':
        this.ctx.logger.debug({ taskId, identifier }, 'Task cancelled');
        this.ctx.eventBus.emit({ type: 'task:cancelled', taskId, identifier, timestamp });
        break;
    }
  }
}
