interface Waiter {
  readonly resolve: () => void;
  readonly reject: (error: Error) => void;
}

/**
 * Counting semaphore for the event loop.
 *
 * Waiters are served in FIFO order. A released permit is handed directly to the
 * oldest waiter, so a late `acquire()` can never overtake a suspended one.
 */
export class Semaphore {
  private permits: number;
  private readonly waiters: Waiter[] = [];

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${String(capacity)}`);
    }
    this.permits = capacity;
  }

  /** Free permits. */
  get available(): number {
    return this.permits;
  }

  /** Callers suspended in `acquire()`. */
  get waiting(): number {
    return this.waiters.length;
  }

  /** Suspend until a permit is available, then take it. */
  acquire(): Promise<void> {
    if (this.permits > 0 && this.waiters.length === 0) {
      this.permits--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /** Return a permit, waking the oldest waiter if there is one. */
  release(): void {
    const next = this.waiters.shift();
    if (next) {
      next.resolve();
      return;
    }
    if (this.permits >= this.capacity) {
      throw new Error('Semaphore released more times than it was acquired');
    }
    this.permits++;
  }

  /** Reject every suspended `acquire()` with `error`. Held permits are unaffected. */
  rejectWaiters(error: Error): void {
    const pending = this.waiters.splice(0, this.waiters.length);
    for (const waiter of pending) {
      waiter.reject(error);
    }
  }

  /** Run `fn` while holding one permit. */
  async runExclusive<R>(fn: () => Promise<R>): Promise<R> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
