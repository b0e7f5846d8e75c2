import { z } from 'zod';
import type { CheckpointRecord } from '../../domain/model/Checkpoint.js';
import { CHECKPOINT_VERSION } from '../../domain/model/Checkpoint.js';

/**
 * On-disk checkpoint document. Times are epoch seconds.
 *
 * Missing set and counter fields default to empty, matching files written by
 * earlier tools that omitted them.
 */
export const CheckpointFileSchema = z.object({
  completed: z.array(z.string()).default([]),
  failed: z.array(z.string()).default([]),
  total_files: z.number().int().nonnegative().default(0),
  start_time: z.number().nonnegative().optional(),
  last_update: z.number().nonnegative().optional(),
  version: z.string().default(CHECKPOINT_VERSION),
});

export type CheckpointFile = z.output<typeof CheckpointFileSchema>;

export function toCheckpointFile(record: CheckpointRecord): CheckpointFile {
  return {
    completed: [...record.completed],
    failed: [...record.failed],
    total_files: record.totalFiles,
    start_time: record.startTime / 1000,
    last_update: record.lastUpdate / 1000,
    version: record.version,
  };
}

/** Convert a validated document. `now` fills in timestamps the document lacks. */
export function fromCheckpointFile(file: CheckpointFile, now: number): CheckpointRecord {
  return {
    completed: file.completed,
    failed: file.failed,
    totalFiles: file.total_files,
    startTime: file.start_time !== undefined ? file.start_time * 1000 : now,
    lastUpdate: file.last_update !== undefined ? file.last_update * 1000 : now,
    version: file.version,
  };
}

export function serializeCheckpoint(record: CheckpointRecord): string {
  return JSON.stringify(toCheckpointFile(record), null, 2);
}

/**
 * Parse and validate checkpoint file content.
 *
 * @throws SyntaxError for malformed JSON, ZodError for a document of the wrong shape.
 */
export function parseCheckpoint(content: string, now: number): CheckpointRecord {
  const json: unknown = JSON.parse(content);
  return fromCheckpointFile(CheckpointFileSchema.parse(json), now);
}
