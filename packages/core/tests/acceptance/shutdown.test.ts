import { describe, it, expect, vi } from 'vitest';
import { TaskPool } from '../../src/TaskPool.js';
import { PoolShutdownError, TaskCancelledError } from '../../src/domain/errors/BatchPoolError.js';
import { createLogger } from '../../src/infrastructure/logging/logger.js';
import type { PoolShutdownEvent } from '../../src/domain/events/DomainEvents.js';

const logger = createLogger({ level: 'silent' });

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal.addEventListener('abort', () => {
      clearTimeout(timer);
      reject(signal.reason);
    });
  });
}

describe('TaskPool shutdown', () => {
  it('should cancel in-flight tasks and wait until the registry is empty', async () => {
    const pool = new TaskPool({ capacity: 2, logger });
    const signals: AbortSignal[] = [];

    const handles = [
      await pool.submit((signal) => {
        signals.push(signal);
        return abortableSleep(5_000, signal);
      }, { identifier: 'a.jpg' }),
      await pool.submit((signal) => {
        signals.push(signal);
        return abortableSleep(5_000, signal);
      }, { identifier: 'b.jpg' }),
    ];

    await pool.shutdown();

    expect(pool.getStats().inFlight).toBe(0);
    expect(pool.getStats().cancelled).toBe(2);
    expect(signals.every((signal) => signal.aborted)).toBe(true);
    expect(signals[0]?.reason).toBeInstanceOf(TaskCancelledError);

    for (const handle of handles) {
      const outcome = handle.outcome;
      expect(outcome?.status).toBe('cancelled');
      if (outcome?.status === 'cancelled') {
        expect(outcome.error.code).toBe('TASK_CANCELLED');
      }
    }
  });

  it('should not wait for work that ignores its signal', async () => {
    const pool = new TaskPool({ capacity: 1, logger });

    const handle = await pool.submit(() => sleep(300), { identifier: 'stubborn.jpg' });
    const startedAt = Date.now();
    await pool.shutdown();

    expect(Date.now() - startedAt).toBeLessThan(250);
    expect((await handle.result).status).toBe('cancelled');
  });

  it('should reject submitters still waiting for a slot', async () => {
    const pool = new TaskPool({ capacity: 1, logger });

    await pool.submit((signal) => abortableSleep(5_000, signal), { identifier: 'holder.jpg' });
    const waiting = pool.submit(() => Promise.resolve(1), { identifier: 'queued.jpg' });
    const rejection = expect(waiting).rejects.toBeInstanceOf(PoolShutdownError);

    await pool.shutdown();
    await rejection;

    const stats = pool.getStats();
    expect(stats.waiting).toBe(0);
    expect(stats.submitted).toBe(1);
  });

  it('should be idempotent and publish pool:shutdown once', async () => {
    const pool = new TaskPool({ capacity: 1, logger });
    const handler = vi.fn<(event: PoolShutdownEvent) => void>();
    pool.on('pool:shutdown', handler);

    await pool.submit((signal) => abortableSleep(5_000, signal), { identifier: 'only.jpg' });
    const first = pool.shutdown();
    const second = pool.shutdown();

    expect(second).toBe(first);
    await first;
    await pool.shutdown();

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0]?.[0].cancelledCount).toBe(1);
    expect(handler.mock.calls[0]?.[0].stats.inFlight).toBe(0);
  });

  it('should resolve immediately on an idle pool', async () => {
    const pool = new TaskPool({ capacity: 3, logger });

    await pool.shutdown();

    expect(pool.isClosed).toBe(true);
    expect(pool.getStats().cancelled).toBe(0);
  });

  it('should keep completed outcomes untouched', async () => {
    const pool = new TaskPool({ capacity: 2, logger });

    const done = await pool.submit(() => Promise.resolve('ok'), { identifier: 'done.jpg' });
    await done.result;
    await pool.shutdown();

    expect(done.outcome?.status).toBe('success');
    expect(pool.getStats().completed).toBe(1);
    expect(pool.getStats().cancelled).toBe(0);
  });
});

describe('TaskPool.waitForCompletion', () => {
  it('should resolve once every task has finished', async () => {
    const pool = new TaskPool({ capacity: 4, logger });

    await pool.submit(() => sleep(30), { identifier: 'a.jpg' });
    await pool.submit(() => sleep(40), { identifier: 'b.jpg' });
    await pool.waitForCompletion(5);

    const stats = pool.getStats();
    expect(stats.inFlight).toBe(0);
    expect(stats.completed).toBe(2);
    expect(pool.isClosed).toBe(false);
  });

  it('should resolve immediately when nothing is in flight', async () => {
    const pool = new TaskPool({ capacity: 1, logger });

    await expect(pool.waitForCompletion()).resolves.toBeUndefined();
  });

  it('should log the remaining count on every poll that finds tasks', async () => {
    const pool = new TaskPool({ capacity: 1, logger });
    const info = vi.spyOn(logger, 'info');

    await pool.submit(() => sleep(25), { identifier: 'a.jpg' });
    await pool.waitForCompletion(10);

    expect(info).toHaveBeenCalledWith({ inFlight: 1 }, 'Waiting for tasks to complete');
    info.mockRestore();
  });

  it('should reject a negative poll interval', async () => {
    const pool = new TaskPool({ capacity: 1, logger });

    await expect(pool.waitForCompletion(-1)).rejects.toThrow(RangeError);
  });
});
