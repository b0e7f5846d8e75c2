import type { RunnerContext } from '../RunnerContext.js';

/** Use case: stop submitting and cancel everything in flight. */
export class AbortRun {
  constructor(private readonly ctx: RunnerContext) {}

  async execute(): Promise<void> {
    if (!this.ctx.aborted) {
      this.ctx.logger.warn({ inFlight: this.ctx.pool.getStats().inFlight }, 'Aborting batch run');
    }
    this.ctx.aborted = true;
    await this.ctx.pool.shutdown();
  }
}
