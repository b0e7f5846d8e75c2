import type { CheckpointStore } from '../../domain/ports/CheckpointStore.js';
import type { CheckpointRecord } from '../../domain/model/Checkpoint.js';

/** Non-persistent checkpoint store. Useful for tests and dry runs. */
export class InMemoryCheckpointStore implements CheckpointStore {
  readonly location = 'memory';
  private record: CheckpointRecord | null = null;

  load(): Promise<CheckpointRecord | null> {
    return Promise.resolve(this.record ? copy(this.record) : null);
  }

  save(record: CheckpointRecord): Promise<void> {
    this.record = copy(record);
    return Promise.resolve();
  }

  clear(): Promise<void> {
    this.record = null;
    return Promise.resolve();
  }
}

function copy(record: CheckpointRecord): CheckpointRecord {
  return { ...record, completed: [...record.completed], failed: [...record.failed] };
}
