import type { PoolContext } from '../PoolContext.js';

/** Use case: poll until no task holds a slot. Cancels nothing. */
export class WaitForCompletion {
  constructor(private readonly ctx: PoolContext) {}

  async execute(pollIntervalMs: number): Promise<void> {
    if (!Number.isFinite(pollIntervalMs) || pollIntervalMs < 0) {
      throw new RangeError(`pollIntervalMs must be a non-negative number, got ${String(pollIntervalMs)}`);
    }

    while (this.ctx.inFlight.size > 0) {
      this.ctx.logger.info({ inFlight: this.ctx.inFlight.size }, 'Waiting for tasks to complete');
      await this.sleep(pollIntervalMs);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
