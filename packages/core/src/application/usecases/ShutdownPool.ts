import { PoolShutdownError } from '../../domain/errors/BatchPoolError.js';
import type { PoolContext } from '../PoolContext.js';

/** Use case: close the pool, cancel everything in flight and wait until the registry is empty. */
export class ShutdownPool {
  constructor(private readonly ctx: PoolContext) {}

  execute(): Promise<void> {
    if (this.ctx.shutdownPromise) return this.ctx.shutdownPromise;

    this.ctx.closed = true;
    this.ctx.shutdownPromise = this.drain();
    return this.ctx.shutdownPromise;
  }

  private async drain(): Promise<void> {
    this.ctx.semaphore.rejectWaiters(new PoolShutdownError());

    const tasks = [...this.ctx.inFlight.values()];
    const cancelledBefore = this.ctx.cancelled;

    if (tasks.length > 0) {
      this.ctx.logger.info({ inFlight: tasks.length }, 'Cancelling in-flight tasks');
      for (const task of tasks) {
        task.cancel();
      }
      await Promise.all(tasks.map((task) => task.finished));
    }

    const cancelledCount = this.ctx.cancelled - cancelledBefore;
    this.ctx.logger.info({ cancelled: cancelledCount }, 'Task pool shut down');
    this.ctx.eventBus.emit({
      type: 'pool:shutdown',
      cancelledCount,
      stats: this.ctx.buildStats(),
      timestamp: Date.now(),
    });
  }
}
