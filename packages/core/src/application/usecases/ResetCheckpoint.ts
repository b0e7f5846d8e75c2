import type { CheckpointContext } from '../CheckpointContext.js';

/** Use case: delete the persisted checkpoint and start tracking from zero. */
export class ResetCheckpoint {
  constructor(private readonly ctx: CheckpointContext) {}

  execute(): Promise<void> {
    return this.ctx.lock.runExclusive(async () => {
      await this.ctx.store.clear();

      this.ctx.completed = new Set();
      this.ctx.failed = new Set();
      this.ctx.totalFiles = 0;
      this.ctx.unsavedCount = 0;
      this.ctx.startTime = this.ctx.clock();

      this.ctx.logger.info({ location: this.ctx.store.location }, 'Checkpoint cleared');
      this.ctx.eventBus.emit({
        type: 'checkpoint:reset',
        location: this.ctx.store.location,
        timestamp: this.ctx.clock(),
      });
    });
  }
}
