/**
 * Terminal outcomes of a submitted task.
 *
 * A task reaches exactly one of these. `CANCELLED` only occurs when the pool is
 * shut down while the task is in flight.
 */
export const TaskStatus = {
  SUCCESS: 'success',
  TASK_ERROR: 'task_error',
  TIMEOUT_ERROR: 'timeout_error',
  CANCELLED: 'cancelled',
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

/** Whether a status counts as a failure for checkpointing purposes. */
export function isFailureStatus(status: TaskStatus): boolean {
  return status !== TaskStatus.SUCCESS;
}
