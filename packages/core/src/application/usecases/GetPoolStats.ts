import type { PoolStats } from '../../domain/model/PoolStats.js';
import type { PoolContext } from '../PoolContext.js';

/** Use case: read-only snapshot of the pool counters. */
export class GetPoolStats {
  constructor(private readonly ctx: PoolContext) {}

  execute(): PoolStats {
    return this.ctx.buildStats();
  }

  /** Identifiers currently holding a slot, oldest first. */
  inFlightIdentifiers(): readonly string[] {
    return [...this.ctx.inFlight.values()].map((task) => task.identifier);
  }
}
