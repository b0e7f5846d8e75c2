import type { CheckpointRecord, LoadedProgress } from '../../domain/model/Checkpoint.js';
import { describeError } from '../../domain/errors/BatchPoolError.js';
import type { CheckpointContext } from '../CheckpointContext.js';

/**
 * Use case: restore progress from the store.
 *
 * An unreadable checkpoint never blocks a restart: it is logged and the run
 * starts from empty sets. An identifier present in both sets is kept as completed.
 */
export class LoadCheckpoint {
  constructor(private readonly ctx: CheckpointContext) {}

  execute(): Promise<LoadedProgress> {
    return this.ctx.lock.runExclusive(async () => {
      const location = this.ctx.store.location;
      let record: CheckpointRecord | null;
      try {
        record = await this.ctx.store.load();
      } catch (error) {
        this.ctx.logger.warn({ err: error, location }, 'Checkpoint is unreadable, starting from scratch');
        this.ctx.eventBus.emit({
          type: 'checkpoint:corrupt',
          location,
          error: describeError(error),
          timestamp: this.ctx.clock(),
        });
        return this.startFresh();
      }

      if (!record) {
        this.ctx.logger.info({ location }, 'No checkpoint found, starting from scratch');
        return this.startFresh();
      }

      const completed = new Set(record.completed);
      this.ctx.completed = completed;
      this.ctx.failed = new Set(record.failed.filter((id) => !completed.has(id)));
      this.ctx.totalFiles = record.totalFiles;
      this.ctx.startTime = record.startTime;
      this.ctx.unsavedCount = 0;

      const progress = this.ctx.buildProgress();
      this.ctx.logger.info(
        {
          location,
          completed: progress.completedCount,
          failed: progress.failedCount,
          totalFiles: progress.totalFiles,
          progressPercentage: Number(progress.progressPercentage.toFixed(1)),
        },
        'Checkpoint loaded',
      );
      this.ctx.eventBus.emit({
        type: 'checkpoint:loaded',
        location,
        completedCount: progress.completedCount,
        failedCount: progress.failedCount,
        totalFiles: progress.totalFiles,
        timestamp: this.ctx.clock(),
      });

      return { completed: new Set(this.ctx.completed), failed: new Set(this.ctx.failed) };
    });
  }

  /** Drop whatever was tracked before, so the manager agrees with what `load()` reports. */
  private startFresh(): LoadedProgress {
    this.ctx.completed = new Set();
    this.ctx.failed = new Set();
    this.ctx.totalFiles = 0;
    this.ctx.unsavedCount = 0;
    this.ctx.startTime = this.ctx.clock();
    return { completed: new Set<string>(), failed: new Set<string>() };
  }
}
