import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { FailureRecord } from '../domain/model/RunSummary.js';

/** One line of the error log. `timestamp` is in epoch seconds. */
export interface ErrorLogEntry {
  readonly file: string;
  readonly error_type: string;
  readonly message: string;
  readonly timestamp: number;
}

/**
 * Writes failed items as JSON Lines, one object per failure.
 *
 * Each run replaces the previous log.
 */
export class ErrorLogWriter {
  constructor(readonly path: string) {}

  async write(failures: readonly FailureRecord[]): Promise<void> {
    const lines = failures.map((failure) => JSON.stringify(toErrorLogEntry(failure)));
    await mkdir(dirname(this.path), { recursive: true });
    await writeFile(this.path, lines.map((line) => `${line}\n`).join(''), 'utf-8');
  }
}

export function toErrorLogEntry(failure: FailureRecord): ErrorLogEntry {
  return {
    file: failure.payloadRef ?? failure.identifier,
    error_type: failure.status,
    message: failure.message,
    timestamp: failure.timestamp / 1000,
  };
}
