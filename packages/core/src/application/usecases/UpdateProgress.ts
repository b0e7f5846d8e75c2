import type { ItemOutcome } from '../../domain/model/Checkpoint.js';
import type { CheckpointContext } from '../CheckpointContext.js';

/**
 * Use case: record one identifier's outcome.
 *
 * The identifier moves into the outcome's set and out of the other one. With
 * `autoSave`, reaching `autoSaveInterval` unsaved outcomes persists before the
 * call returns; a failed save is rethrown and retried on the next update.
 */
export class UpdateProgress {
  constructor(private readonly ctx: CheckpointContext) {}

  async execute(identifier: string, outcome: ItemOutcome, autoSave: boolean): Promise<void> {
    if (identifier.length === 0) {
      throw new TypeError('Cannot record progress for an empty identifier');
    }

    return this.ctx.lock.runExclusive(async () => {
      if (outcome === 'completed') {
        this.ctx.completed.add(identifier);
        this.ctx.failed.delete(identifier);
      } else {
        this.ctx.failed.add(identifier);
        this.ctx.completed.delete(identifier);
      }
      this.ctx.unsavedCount++;

      if (autoSave && this.ctx.unsavedCount >= this.ctx.autoSaveInterval) {
        await this.ctx.persist();
      }
    });
  }
}
