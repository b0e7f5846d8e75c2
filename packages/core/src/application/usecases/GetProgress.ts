import type { ProgressStats } from '../../domain/model/Checkpoint.js';
import type { CheckpointContext } from '../CheckpointContext.js';

/** Use case: read-only queries over the tracked progress. */
export class GetProgress {
  constructor(private readonly ctx: CheckpointContext) {}

  execute(): ProgressStats {
    return this.ctx.buildProgress();
  }

  /** Only completed identifiers are skipped; failed ones are always retried. */
  shouldSkip(identifier: string, forceRerun: boolean): boolean {
    if (forceRerun) return false;
    return this.ctx.completed.has(identifier);
  }

  completed(): Set<string> {
    return new Set(this.ctx.completed);
  }

  failed(): Set<string> {
    return new Set(this.ctx.failed);
  }
}
