import { readFile, rename, rm, mkdir, open } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { CheckpointStore } from '../../domain/ports/CheckpointStore.js';
import type { CheckpointRecord } from '../../domain/model/Checkpoint.js';
import { PersistenceCorruptError, PersistenceFailedError } from '../../domain/errors/BatchPoolError.js';
import type { Logger } from '../logging/logger.js';
import { getRootLogger } from '../logging/logger.js';
import { parseCheckpoint, serializeCheckpoint } from './CheckpointFileMapper.js';

/** Filesystem operations used by the store. Replaceable for fault-injection tests. */
export interface CheckpointFileSystem {
  readFile(path: string): Promise<string>;
  /** Write `data` and flush it to stable storage before resolving. */
  writeFile(path: string, data: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  remove(path: string): Promise<void>;
  mkdir(path: string): Promise<void>;
}

export interface FileCheckpointStoreOptions {
  /** Checkpoint file path. Default: `'.batchpool/checkpoint.json'`. */
  readonly path?: string;
  /** Default: Node's `fs/promises`. */
  readonly fileSystem?: CheckpointFileSystem;
  readonly logger?: Logger;
  readonly clock?: () => number;
}

export const DEFAULT_CHECKPOINT_FILE = '.batchpool/checkpoint.json';

/** `fs/promises`-backed implementation with fsync on write. */
export const nodeFileSystem: CheckpointFileSystem = {
  readFile: (path) => readFile(path, 'utf-8'),
  async writeFile(path, data) {
    const handle = await open(path, 'w');
    try {
      await handle.writeFile(data, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
  },
  rename: (from, to) => rename(from, to),
  remove: (path) => rm(path, { force: true }),
  async mkdir(path) {
    await mkdir(path, { recursive: true });
  },
};

/**
 * Checkpoint store backed by a single JSON file.
 *
 * Writes go to `{path}.tmp` and are renamed over the canonical file, so a crash
 * at any point leaves either the previous or the new checkpoint on disk, never a
 * truncated one. Callers must not run two saves against the same path at once;
 * `CheckpointManager` serialises them.
 *
 * Node.js only.
 */
export class FileCheckpointStore implements CheckpointStore {
  readonly location: string;
  private readonly tempPath: string;
  private readonly fs: CheckpointFileSystem;
  private readonly logger: Logger;
  private readonly clock: () => number;

  constructor(options?: FileCheckpointStoreOptions) {
    this.location = options?.path ?? DEFAULT_CHECKPOINT_FILE;
    this.tempPath = `${this.location}.tmp`;
    this.fs = options?.fileSystem ?? nodeFileSystem;
    this.logger = options?.logger ?? getRootLogger().child({ component: 'checkpoint-store' });
    this.clock = options?.clock ?? Date.now;
  }

  async load(): Promise<CheckpointRecord | null> {
    let content: string;
    try {
      content = await this.fs.readFile(this.location);
    } catch (error) {
      if (isNotFound(error)) return null;
      throw new PersistenceCorruptError(this.location, error);
    }

    try {
      return parseCheckpoint(content, this.clock());
    } catch (error) {
      throw new PersistenceCorruptError(this.location, error);
    }
  }

  async save(record: CheckpointRecord): Promise<void> {
    try {
      await this.fs.mkdir(dirname(this.location));
      await this.fs.writeFile(this.tempPath, serializeCheckpoint(record));
      await this.fs.rename(this.tempPath, this.location);
    } catch (error) {
      await this.removeTemp();
      throw new PersistenceFailedError(this.location, error);
    }
  }

  async clear(): Promise<void> {
    try {
      await this.fs.remove(this.location);
      await this.fs.remove(this.tempPath);
    } catch (error) {
      throw new PersistenceFailedError(this.location, error);
    }
  }

  private async removeTemp(): Promise<void> {
    try {
      await this.fs.remove(this.tempPath);
    } catch (cleanupError) {
      this.logger.warn({ err: cleanupError, path: this.tempPath }, 'Failed to remove temporary checkpoint file');
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
