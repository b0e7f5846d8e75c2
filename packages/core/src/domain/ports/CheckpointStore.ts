import type { CheckpointRecord } from '../model/Checkpoint.js';

/**
 * Port for persisting checkpoint records.
 *
 * Implementations must replace the record atomically: after a failed `save()`
 * the previously saved record is still returned by `load()`.
 *
 * Error contract:
 * - `load()` resolves `null` when nothing was ever saved, and rejects with
 *   `PersistenceCorruptError` when the stored record cannot be read or parsed.
 * - `save()` and `clear()` reject with `PersistenceFailedError`.
 */
export interface CheckpointStore {
  /** Human-readable location, used in logs and errors. */
  readonly location: string;
  /** Read the last saved record. */
  load(): Promise<CheckpointRecord | null>;
  /** Atomically replace the stored record. */
  save(record: CheckpointRecord): Promise<void>;
  /** Remove the stored record. Succeeds when nothing is stored. */
  clear(): Promise<void>;
}
