import type { CheckpointRecord, ProgressStats } from '../domain/model/Checkpoint.js';
import { CHECKPOINT_VERSION } from '../domain/model/Checkpoint.js';
import type { CheckpointStore } from '../domain/ports/CheckpointStore.js';
import type { Logger } from '../infrastructure/logging/logger.js';
import { Semaphore } from '../domain/services/Semaphore.js';
import type { EventBus } from './EventBus.js';

/**
 * Mutable progress state shared by the checkpoint use cases.
 *
 * Internal class. Every mutation and every persist happens while holding
 * `lock`, so a save always writes a consistent snapshot.
 */
export class CheckpointContext {
  readonly store: CheckpointStore;
  readonly autoSaveInterval: number;
  readonly eventBus: EventBus;
  readonly logger: Logger;
  readonly clock: () => number;
  readonly lock = new Semaphore(1);

  completed = new Set<string>();
  failed = new Set<string>();
  totalFiles = 0;
  startTime: number;
  /** Outcomes recorded since the last successful persist. */
  unsavedCount = 0;

  constructor(
    store: CheckpointStore,
    autoSaveInterval: number,
    eventBus: EventBus,
    logger: Logger,
    clock: () => number,
  ) {
    this.store = store;
    this.autoSaveInterval = autoSaveInterval;
    this.eventBus = eventBus;
    this.logger = logger;
    this.clock = clock;
    this.startTime = clock();
  }

  buildRecord(): CheckpointRecord {
    return {
      completed: [...this.completed],
      failed: [...this.failed],
      totalFiles: this.totalFiles,
      startTime: this.startTime,
      lastUpdate: this.clock(),
      version: CHECKPOINT_VERSION,
    };
  }

  buildProgress(): ProgressStats {
    const completedCount = this.completed.size;
    const failedCount = this.failed.size;
    const processedCount = completedCount + failedCount;
    const remainingCount = Math.max(0, this.totalFiles - processedCount);
    const elapsedMs = Math.max(0, this.clock() - this.startTime);

    return {
      completedCount,
      failedCount,
      processedCount,
      totalFiles: this.totalFiles,
      remainingCount,
      successRate: processedCount > 0 ? (completedCount / processedCount) * 100 : 0,
      progressPercentage: this.totalFiles > 0 ? (processedCount / this.totalFiles) * 100 : 0,
      elapsedMs,
      estimatedRemainingMs: processedCount > 0 ? (elapsedMs / processedCount) * remainingCount : 0,
    };
  }

  /** Write the current state. Caller must hold `lock`. */
  async persist(): Promise<void> {
    await this.store.save(this.buildRecord());
    this.unsavedCount = 0;

    const progress = this.buildProgress();
    this.logger.debug(
      { location: this.store.location, completed: progress.completedCount, failed: progress.failedCount },
      'Checkpoint saved',
    );
    this.eventBus.emit({
      type: 'checkpoint:saved',
      location: this.store.location,
      progress,
      timestamp: this.clock(),
    });
  }
}
