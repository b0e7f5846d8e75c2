import type { TaskResult, WorkItemMetadata } from './Task.js';

/**
 * Caller-side view of a submitted task.
 *
 * Poll with `done` / `outcome`, or await `result`. The result promise never
 * rejects: every failure mode is a `TaskResult` variant. Only the pool that
 * created the handle can settle it.
 */
export class TaskHandle<T> {
  readonly taskId: number;
  readonly identifier: string;
  readonly payloadRef?: string;
  /** Resolves with the terminal outcome, exactly once. */
  readonly result: Promise<TaskResult<T>>;

  private settledOutcome: TaskResult<T> | undefined;

  /** @internal Created by the pool, which keeps the resolver of `outcome`. */
  constructor(taskId: number, metadata: WorkItemMetadata, outcome: Promise<TaskResult<T>>) {
    this.taskId = taskId;
    this.identifier = metadata.identifier;
    this.payloadRef = metadata.payloadRef;
    this.result = outcome.then((settled) => {
      this.settledOutcome = settled;
      return settled;
    });
  }

  /** `true` once the task has reached its terminal outcome. */
  get done(): boolean {
    return this.settledOutcome !== undefined;
  }

  /** The terminal outcome, or `undefined` while the task is still running. */
  get outcome(): TaskResult<T> | undefined {
    return this.settledOutcome;
  }
}
