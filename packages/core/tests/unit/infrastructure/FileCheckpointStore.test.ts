import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile, access } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileCheckpointStore, nodeFileSystem } from '../../../src/infrastructure/state/FileCheckpointStore.js';
import type { CheckpointFileSystem } from '../../../src/infrastructure/state/FileCheckpointStore.js';
import { PersistenceCorruptError, PersistenceFailedError } from '../../../src/domain/errors/BatchPoolError.js';
import { createLogger } from '../../../src/infrastructure/logging/logger.js';
import type { CheckpointRecord } from '../../../src/domain/model/Checkpoint.js';

const logger = createLogger({ level: 'silent' });

function createRecord(overrides?: Partial<CheckpointRecord>): CheckpointRecord {
  return {
    completed: ['a.jpg', 'b.jpg'],
    failed: ['c.jpg'],
    totalFiles: 10,
    startTime: 1_700_000_000_000,
    lastUpdate: 1_700_000_001_000,
    version: '1.0',
    ...overrides,
  };
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('FileCheckpointStore', () => {
  let dir: string;
  let path: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'batchpool-store-'));
    path = join(dir, 'nested', 'checkpoint.json');
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('save / load', () => {
    it('should persist and retrieve a record', async () => {
      const store = new FileCheckpointStore({ path, logger });
      const record = createRecord();

      await store.save(record);

      expect(await store.load()).toEqual(record);
    });

    it('should create missing parent directories', async () => {
      const store = new FileCheckpointStore({ path, logger });

      await store.save(createRecord());

      expect(await exists(path)).toBe(true);
    });

    it('should write the documented JSON format', async () => {
      const store = new FileCheckpointStore({ path, logger });
      await store.save(createRecord());

      const parsed: unknown = JSON.parse(await readFile(path, 'utf-8'));
      expect(parsed).toEqual({
        completed: ['a.jpg', 'b.jpg'],
        failed: ['c.jpg'],
        total_files: 10,
        start_time: 1_700_000_000,
        last_update: 1_700_000_001,
        version: '1.0',
      });
    });

    it('should not leave a temporary file behind', async () => {
      const store = new FileCheckpointStore({ path, logger });
      await store.save(createRecord());

      expect(await exists(`${path}.tmp`)).toBe(false);
    });

    it('should replace an existing record as a whole', async () => {
      const store = new FileCheckpointStore({ path, logger });
      await store.save(createRecord());
      await store.save(createRecord({ completed: ['z.jpg'], failed: [], totalFiles: 1 }));

      const loaded = await store.load();
      expect(loaded?.completed).toEqual(['z.jpg']);
      expect(loaded?.failed).toEqual([]);
      expect(loaded?.totalFiles).toBe(1);
    });

    it('should return null when no checkpoint exists', async () => {
      const store = new FileCheckpointStore({ path, logger });

      expect(await store.load()).toBeNull();
    });

    it('should reject with PersistenceCorruptError for malformed content', async () => {
      const store = new FileCheckpointStore({ path: join(dir, 'broken.json'), logger });
      await writeFile(join(dir, 'broken.json'), '{"completed": ["a.jpg"', 'utf-8');

      await expect(store.load()).rejects.toBeInstanceOf(PersistenceCorruptError);
    });

    it('should reject with PersistenceCorruptError when the path cannot be read as a file', async () => {
      const store = new FileCheckpointStore({ path: dir, logger });

      await expect(store.load()).rejects.toBeInstanceOf(PersistenceCorruptError);
    });
  });

  describe('crash atomicity', () => {
    it('should leave the previous checkpoint intact when the rename fails', async () => {
      const failingRename: CheckpointFileSystem = {
        ...nodeFileSystem,
        rename: () => Promise.reject(new Error('simulated crash before rename')),
      };
      const healthy = new FileCheckpointStore({ path, logger });
      const crashing = new FileCheckpointStore({ path, logger, fileSystem: failingRename });

      await healthy.save(createRecord());
      const before = await readFile(path, 'utf-8');

      await expect(crashing.save(createRecord({ completed: ['other.jpg'], totalFiles: 99 }))).rejects.toBeInstanceOf(
        PersistenceFailedError,
      );

      expect(await readFile(path, 'utf-8')).toBe(before);
      expect(await exists(`${path}.tmp`)).toBe(false);
      expect(await healthy.load()).toEqual(createRecord());
    });

    it('should leave the previous checkpoint intact when writing the temporary file fails', async () => {
      const failingWrite: CheckpointFileSystem = {
        ...nodeFileSystem,
        writeFile: () => Promise.reject(new Error('disk full')),
      };
      const healthy = new FileCheckpointStore({ path, logger });
      const crashing = new FileCheckpointStore({ path, logger, fileSystem: failingWrite });

      await healthy.save(createRecord());

      const error: unknown = await crashing.save(createRecord({ completed: [] })).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(PersistenceFailedError);
      expect(error instanceof PersistenceFailedError && error.cause instanceof Error && error.cause.message).toBe(
        'disk full',
      );
      expect(await healthy.load()).toEqual(createRecord());
    });
  });

  describe('clear', () => {
    it('should remove the checkpoint file', async () => {
      const store = new FileCheckpointStore({ path, logger });
      await store.save(createRecord());

      await store.clear();

      expect(await exists(path)).toBe(false);
      expect(await store.load()).toBeNull();
    });

    it('should succeed when nothing was saved', async () => {
      const store = new FileCheckpointStore({ path, logger });

      await expect(store.clear()).resolves.toBeUndefined();
    });
  });

  describe('default location', () => {
    it('should use .batchpool/checkpoint.json as default path', () => {
      const store = new FileCheckpointStore({ logger });

      expect(store.location).toBe('.batchpool/checkpoint.json');
    });
  });
});
