import type { CheckpointContext } from '../CheckpointContext.js';

/** Use case: replace the tracked sets and persist them as one record. The sets stay disjoint. */
export class SaveCheckpoint {
  constructor(private readonly ctx: CheckpointContext) {}

  async execute(completed: Iterable<string>, failed: Iterable<string>, totalFiles?: number): Promise<void> {
    if (totalFiles !== undefined) assertTotalFiles(totalFiles);

    const completedSnapshot = new Set(completed);
    // An identifier given in both sets is kept as completed, as on load.
    const failedSnapshot = new Set([...failed].filter((id) => !completedSnapshot.has(id)));

    return this.ctx.lock.runExclusive(async () => {
      this.ctx.completed = completedSnapshot;
      this.ctx.failed = failedSnapshot;
      if (totalFiles !== undefined) this.ctx.totalFiles = totalFiles;
      await this.ctx.persist();
    });
  }

  /** Persist the state as currently tracked. */
  flush(): Promise<void> {
    return this.ctx.lock.runExclusive(() => this.ctx.persist());
  }
}

export function assertTotalFiles(totalFiles: number): void {
  if (!Number.isInteger(totalFiles) || totalFiles < 0) {
    throw new RangeError(`totalFiles must be a non-negative integer, got ${String(totalFiles)}`);
  }
}
