import type { PoolStats } from '../domain/model/PoolStats.js';
import type { TaskStatus } from '../domain/model/TaskStatus.js';
import type { Logger } from '../infrastructure/logging/logger.js';
import { Semaphore } from '../domain/services/Semaphore.js';
import type { EventBus } from './EventBus.js';

/** Registry entry for a task that currently holds a slot. */
export interface InFlightTask {
  readonly taskId: number;
  readonly identifier: string;
  readonly startedAt: number;
  /** Abort the task's signal and make it settle as `cancelled`. */
  readonly cancel: () => void;
  /** Resolves after the task settled and released its slot. Never rejects. */
  readonly finished: Promise<void>;
}

/**
 * Mutable state shared by the pool's use cases.
 *
 * Internal class. All counters and the in-flight registry are written here or by
 * the use cases in `application/usecases/` and nowhere else. Each registered task
 * holds exactly one semaphore permit, so `inFlight.size <= capacity`.
 */
export class PoolContext {
  readonly capacity: number;
  readonly timeoutMs: number;
  readonly semaphore: Semaphore;
  readonly eventBus: EventBus;
  readonly logger: Logger;

  readonly inFlight = new Map<number, InFlightTask>();
  nextTaskId = 0;
  submitted = 0;
  completed = 0;
  failed = 0;
  timedOut = 0;
  cancelled = 0;
  peakInFlight = 0;

  closed = false;
  shutdownPromise: Promise<void> | null = null;

  constructor(capacity: number, timeoutMs: number, eventBus: EventBus, logger: Logger) {
    this.capacity = capacity;
    this.timeoutMs = timeoutMs;
    this.semaphore = new Semaphore(capacity);
    this.eventBus = eventBus;
    this.logger = logger;
  }

  /** Add a task that has just acquired a permit. */
  register(task: InFlightTask): void {
    this.inFlight.set(task.taskId, task);
    this.submitted++;
    this.peakInFlight = Math.max(this.peakInFlight, this.inFlight.size);
  }

  /** Remove a task and return its permit. A second call for the same task is a no-op. */
  unregister(taskId: number): void {
    if (this.inFlight.delete(taskId)) {
      this.semaphore.release();
    }
  }

  recordOutcome(status: TaskStatus): void {
    switch (status) {
      case 'success':
        this.completed++;
        break;
      case 'task_error':
        this.failed++;
        break;
      case 'timeout_error':
        this.timedOut++;
        this.failed++;
        break;
      case 'cancelled':
        this.cancelled++;
        break;
    }
  }

  buildStats(): PoolStats {
    return {
      capacity: this.capacity,
      inFlight: this.inFlight.size,
      available: this.semaphore.available,
      waiting: this.semaphore.waiting,
      submitted: this.submitted,
      completed: this.completed,
      failed: this.failed,
      timedOut: this.timedOut,
      cancelled: this.cancelled,
      peakInFlight: this.peakInFlight,
      successRate: (this.completed / Math.max(this.submitted, 1)) * 100,
    };
  }
}
