/** Point-in-time snapshot of a task pool. Plain data, safe to serialise. */
export interface PoolStats {
  /** Maximum number of tasks in flight at once. */
  readonly capacity: number;
  readonly inFlight: number;
  /** Free slots right now. */
  readonly available: number;
  /** Submitters suspended while waiting for a slot. */
  readonly waiting: number;
  readonly submitted: number;
  readonly completed: number;
  /** Task errors plus timeouts. */
  readonly failed: number;
  readonly timedOut: number;
  readonly cancelled: number;
  /** Highest `inFlight` observed since the pool was created. */
  readonly peakInFlight: number;
  /** `completed / max(submitted, 1) * 100`. */
  readonly successRate: number;
}
