import { describe, it, expect } from 'vitest';
import { TaskPool } from '../../src/TaskPool.js';
import { EventBus } from '../../src/application/EventBus.js';
import { PoolShutdownError, WorkItemFailedError } from '../../src/domain/errors/BatchPoolError.js';
import { createLogger } from '../../src/infrastructure/logging/logger.js';
import type { TaskHandle } from '../../src/domain/model/TaskHandle.js';
import type { DomainEvent } from '../../src/domain/events/DomainEvents.js';

const logger = createLogger({ level: 'silent' });

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function createGate(): { opened: Promise<void>; open: () => void } {
  let open: () => void = () => undefined;
  const opened = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { opened, open };
}

describe('TaskPool', () => {
  describe('admission control', () => {
    it('should never run more tasks than its capacity', async () => {
      const pool = new TaskPool({ capacity: 2, logger });
      let active = 0;
      let maxActive = 0;

      const startedAt = Date.now();
      const handles: TaskHandle<string>[] = [];
      for (const name of ['a', 'b', 'c', 'd', 'e']) {
        handles.push(
          await pool.submit(async () => {
            active++;
            maxActive = Math.max(maxActive, active);
            await sleep(50);
            active--;
            return name;
          }, { identifier: `${name}.jpg` }),
        );
      }
      const outcomes = await Promise.all(handles.map((handle) => handle.result));
      const elapsed = Date.now() - startedAt;

      expect(outcomes.map((outcome) => outcome.status)).toEqual(['success', 'success', 'success', 'success', 'success']);
      expect(maxActive).toBe(2);
      expect(elapsed).toBeGreaterThanOrEqual(140);

      const stats = pool.getStats();
      expect(stats.peakInFlight).toBe(2);
      expect(stats.submitted).toBe(5);
      expect(stats.completed).toBe(5);
      expect(stats.failed).toBe(0);
      expect(stats.inFlight).toBe(0);
      expect(stats.available).toBe(2);
      expect(stats.successRate).toBe(100);
    });

    it('should suspend submit() until a slot is released', async () => {
      const pool = new TaskPool({ capacity: 1, logger });
      const gate = createGate();

      const first = await pool.submit(() => gate.opened, { identifier: 'first.jpg' });
      let secondAdmitted = false;
      const second = pool.submit(() => Promise.resolve('done'), { identifier: 'second.jpg' }).then((handle) => {
        secondAdmitted = true;
        return handle;
      });

      await sleep(10);
      expect(secondAdmitted).toBe(false);
      expect(pool.getStats().waiting).toBe(1);
      expect(pool.getInFlight()).toEqual(['first.jpg']);

      gate.open();
      await first.result;
      const handle = await second;

      expect(secondAdmitted).toBe(true);
      expect((await handle.result).status).toBe('success');
      expect(pool.getStats().waiting).toBe(0);
    });

    it('should admit waiting submitters in submission order', async () => {
      const pool = new TaskPool({ capacity: 1, logger });
      const gate = createGate();
      const admitted: string[] = [];

      await pool.submit(() => gate.opened, { identifier: 'blocker' });
      const pending = ['x', 'y', 'z'].map((id) =>
        pool.submit(() => Promise.resolve(id), { identifier: id }).then((handle) => {
          admitted.push(handle.identifier);
          return handle.result;
        }),
      );

      gate.open();
      await Promise.all(pending);

      expect(admitted).toEqual(['x', 'y', 'z']);
    });
  });

  describe('slot conservation', () => {
    it('should release every slot whatever the outcome', async () => {
      const pool = new TaskPool({ capacity: 3, timeoutMs: 20, logger });

      const handles = [
        await pool.submit(() => Promise.resolve(1), { identifier: 'ok-1' }),
        await pool.submit(() => Promise.reject(new Error('remote 500')), { identifier: 'err-1' }),
        await pool.submit(() => sleep(200).then(() => 3), { identifier: 'slow-1' }),
        await pool.submit(() => Promise.resolve(4), { identifier: 'ok-2' }),
        await pool.submit(() => Promise.reject(new Error('remote 503')), { identifier: 'err-2' }),
      ];
      const outcomes = await Promise.all(handles.map((handle) => handle.result));

      expect(outcomes.map((outcome) => outcome.status)).toEqual([
        'success',
        'task_error',
        'timeout_error',
        'success',
        'task_error',
      ]);

      const stats = pool.getStats();
      expect(stats.inFlight).toBe(0);
      expect(stats.available).toBe(3);
      expect(stats.submitted).toBe(5);
      expect(stats.completed).toBe(2);
      expect(stats.failed).toBe(3);
      expect(stats.timedOut).toBe(1);
      expect(stats.successRate).toBe(40);
    });

    it('should report a success rate of 0 before anything is submitted', () => {
      const pool = new TaskPool({ capacity: 4, logger });

      expect(pool.getStats()).toEqual({
        capacity: 4,
        inFlight: 0,
        available: 4,
        waiting: 0,
        submitted: 0,
        completed: 0,
        failed: 0,
        timedOut: 0,
        cancelled: 0,
        peakInFlight: 0,
        successRate: 0,
      });
    });
  });

  describe('outcomes', () => {
    it('should carry the value, identifier and payload reference on success', async () => {
      const pool = new TaskPool({ capacity: 1, logger });

      const handle = await pool.submit(() => Promise.resolve({ caption: 'a cat' }), {
        identifier: 'cat.jpg',
        payloadRef: '/images/cat.jpg',
      });
      const outcome = await handle.result;

      expect(outcome.status).toBe('success');
      expect(outcome.identifier).toBe('cat.jpg');
      expect(outcome.payloadRef).toBe('/images/cat.jpg');
      if (outcome.status === 'success') {
        expect(outcome.value).toEqual({ caption: 'a cat' });
      }
    });

    it('should capture a rejection with its cause and stack trace', async () => {
      const pool = new TaskPool({ capacity: 1, logger });
      const cause = new Error('connection reset');

      const handle = await pool.submit(() => Promise.reject(cause), { identifier: 'dog.jpg' });
      const outcome = await handle.result;

      expect(outcome.status).toBe('task_error');
      if (outcome.status === 'task_error') {
        expect(outcome.message).toBe('connection reset');
        expect(outcome.trace).toBe(cause.stack);
        expect(outcome.error).toBeInstanceOf(WorkItemFailedError);
        expect(outcome.error.cause).toBe(cause);
        expect(outcome.error.message).toBe("Task 'dog.jpg' failed: connection reset");
      }
    });

    it('should capture an error thrown synchronously by the work item', async () => {
      const pool = new TaskPool({ capacity: 1, logger });

      const handle = await pool.submit(
        () => {
          throw new Error('bad payload');
        },
        { identifier: 'sync.jpg' },
      );
      const outcome = await handle.result;

      expect(outcome.status).toBe('task_error');
      expect(outcome.status === 'task_error' && outcome.message).toBe('bad payload');
      expect(pool.getStats().inFlight).toBe(0);
    });

    it('should describe non-Error rejections without a trace', async () => {
      const pool = new TaskPool({ capacity: 1, logger });

      const handle = await pool.submit(() => Promise.reject('quota exceeded'), { identifier: 'str.jpg' });
      const outcome = await handle.result;

      expect(outcome.status).toBe('task_error');
      if (outcome.status === 'task_error') {
        expect(outcome.message).toBe('quota exceeded');
        expect(outcome.trace).toBeUndefined();
      }
    });

    it('should be pollable through done and outcome', async () => {
      const pool = new TaskPool({ capacity: 1, logger });
      const gate = createGate();

      const handle = await pool.submit(() => gate.opened.then(() => 'ok'), { identifier: 'poll.jpg' });
      expect(handle.done).toBe(false);
      expect(handle.outcome).toBeUndefined();

      gate.open();
      await handle.result;

      expect(handle.done).toBe(true);
      expect(handle.outcome?.status).toBe('success');
    });

    it('should assign monotonically increasing task ids', async () => {
      const pool = new TaskPool({ capacity: 5, logger });

      const handles = [
        await pool.submit(() => Promise.resolve(1), { identifier: 'a' }),
        await pool.submit(() => Promise.resolve(2), { identifier: 'b' }),
        await pool.submit(() => Promise.resolve(3), { identifier: 'c' }),
      ];
      await Promise.all(handles.map((handle) => handle.result));

      expect(handles[1]?.taskId).toBeGreaterThan(handles[0]?.taskId ?? Infinity);
      expect(handles[2]?.taskId).toBeGreaterThan(handles[1]?.taskId ?? Infinity);
    });
  });

  describe('validation', () => {
    it('should reject an empty identifier', async () => {
      const pool = new TaskPool({ capacity: 1, logger });

      await expect(pool.submit(() => Promise.resolve(1), { identifier: '' })).rejects.toThrow(TypeError);
      expect(pool.getStats().submitted).toBe(0);
    });

    it('should reject an invalid capacity', () => {
      expect(() => new TaskPool({ capacity: 0, logger })).toThrow(RangeError);
      expect(() => new TaskPool({ capacity: 1.5, logger })).toThrow(RangeError);
    });

    it('should reject submit() after shutdown', async () => {
      const pool = new TaskPool({ capacity: 1, logger });
      await pool.shutdown();

      await expect(pool.submit(() => Promise.resolve(1), { identifier: 'late.jpg' })).rejects.toBeInstanceOf(
        PoolShutdownError,
      );
      expect(pool.isClosed).toBe(true);
    });
  });

  describe('events', () => {
    it('should publish submitted and terminal events on a shared bus', async () => {
      const eventBus = new EventBus(logger);
      const pool = new TaskPool({ capacity: 2, logger, eventBus });
      const events: DomainEvent[] = [];
      pool.onAny((event) => events.push(event));

      const ok = await pool.submit(() => Promise.resolve(1), { identifier: 'ok.jpg' });
      await ok.result;
      const bad = await pool.submit(() => Promise.reject(new Error('nope')), { identifier: 'bad.jpg' });
      await bad.result;

      expect(events.map((event) => `${event.type}:${'identifier' in event ? event.identifier : ''}`)).toEqual([
        'task:submitted:ok.jpg',
        'task:completed:ok.jpg',
        'task:submitted:bad.jpg',
        'task:failed:bad.jpg',
      ]);
    });

    it('should report the failure message in task:failed', async () => {
      const pool = new TaskPool({ capacity: 1, logger });
      const messages: string[] = [];
      pool.on('task:failed', (event) => messages.push(event.error));

      const handle = await pool.submit(() => Promise.reject(new Error('HTTP 429')), { identifier: 'x.jpg' });
      await handle.result;

      expect(messages).toEqual(['HTTP 429']);
    });
  });
});
