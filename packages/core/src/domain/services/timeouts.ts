/** Largest delay Node timers accept. Longer delays silently fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Default per-task ceiling: 72 hours, sized for a heavily queued remote service. */
export const DEFAULT_TASK_TIMEOUT_MS = 72 * 60 * 60 * 1000;

/**
 * Validate a task timeout. `Infinity` disables the timeout.
 *
 * @throws RangeError for non-positive values, `NaN`, or finite values above {@link MAX_TIMEOUT_MS}.
 */
export function assertValidTimeout(timeoutMs: number): number {
  if (timeoutMs === Number.POSITIVE_INFINITY) return timeoutMs;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new RangeError(`timeoutMs must be a positive number or Infinity, got ${String(timeoutMs)}`);
  }
  if (timeoutMs > MAX_TIMEOUT_MS) {
    throw new RangeError(`timeoutMs must not exceed ${String(MAX_TIMEOUT_MS)}ms, got ${String(timeoutMs)}`);
  }
  return timeoutMs;
}
