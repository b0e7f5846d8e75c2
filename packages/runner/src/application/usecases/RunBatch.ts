import { ItemOutcome, PoolShutdownError, describeError, isFailureStatus } from '@batchpool/core';
import type { TaskHandle, TaskResult } from '@batchpool/core';
import type { FailureRecord, RunSummary } from '../../domain/model/RunSummary.js';
import type { ItemProcessor, RunOptions } from '../../domain/model/RunOptions.js';
import type { RunnerContext } from '../RunnerContext.js';

/**
 * Use case: one pass over the input.
 *
 * Loads the checkpoint, skips completed items, submits the rest and records
 * every outcome. Outcomes are recorded as they arrive; the final save happens
 * after the last one. A checkpoint write failure does not stop the run: it is
 * logged and rethrown once the pool has drained.
 */
export class RunBatch<TItem, TResult> {
  private readonly failures: FailureRecord[] = [];
  private readonly recordings: Promise<void>[] = [];
  private persistenceError: Error | undefined;
  private seen = 0;
  private skipped = 0;
  private submitted = 0;
  private succeeded = 0;
  private failed = 0;
  private timedOut = 0;
  private cancelled = 0;

  constructor(
    private readonly ctx: RunnerContext,
    private readonly processor: ItemProcessor<TItem, TResult>,
    private readonly options: RunOptions<TItem>,
  ) {}

  async execute(items: Iterable<TItem> | AsyncIterable<TItem>): Promise<RunSummary> {
    if (this.ctx.running) {
      throw new Error('A batch run is already in progress on this runner');
    }
    this.ctx.running = true;
    try {
      return await this.run(items);
    } finally {
      this.ctx.running = false;
    }
  }

  private async run(items: Iterable<TItem> | AsyncIterable<TItem>): Promise<RunSummary> {
    const startedAt = Date.now();
    const { checkpoint, logger } = this.ctx;

    await checkpoint.load();
    const total = this.options.total ?? (Array.isArray(items) ? items.length : undefined);
    if (total !== undefined) checkpoint.setTotalFiles(total);

    try {
      await this.submitAll(items);
    } catch (error) {
      // Keep the outcomes already recorded before surfacing the input failure.
      logger.error({ err: error, seen: this.seen }, 'Reading items failed, saving progress before stopping');
      await Promise.all(this.recordings);
      await this.finalSave();
      throw error;
    }
    await Promise.all(this.recordings);

    if (total === undefined && !this.ctx.aborted) checkpoint.setTotalFiles(this.seen);
    await this.finalSave();

    if (this.ctx.errorLog && this.failures.length > 0) {
      await this.ctx.errorLog.write(this.failures);
      logger.info({ path: this.ctx.errorLog.path, failures: this.failures.length }, 'Error log written');
    }

    const summary = this.summarize(startedAt);
    logger.info(
      {
        total: summary.total,
        skipped: summary.skipped,
        succeeded: summary.succeeded,
        failed: summary.failed,
        timedOut: summary.timedOut,
        cancelled: summary.cancelled,
        elapsedMs: summary.elapsedMs,
        aborted: summary.aborted,
      },
      'Batch run finished',
    );

    if (this.persistenceError) throw this.persistenceError;
    return summary;
  }

  private async submitAll(items: Iterable<TItem> | AsyncIterable<TItem>): Promise<void> {
    const identify = this.options.identify ?? identifyString;
    const forceRerun = this.options.forceRerun ?? this.ctx.forceRerun;

    for await (const item of items) {
      if (this.ctx.aborted) break;
      this.seen++;

      const identifier = identify(item);
      if (this.ctx.checkpoint.shouldSkip(identifier, forceRerun)) {
        this.skipped++;
        continue;
      }

      let handle: TaskHandle<TResult>;
      try {
        handle = await this.ctx.pool.submit((signal) => this.processor(item, signal), {
          identifier,
          payloadRef: this.options.payloadRef?.(item),
        });
      } catch (error) {
        if (error instanceof PoolShutdownError) {
          this.ctx.logger.info({ identifier }, 'Pool shut down, no further items will be submitted');
          break;
        }
        throw error;
      }

      this.submitted++;
      this.recordings.push(handle.result.then((outcome) => this.record(outcome)));
    }
  }

  private async record(outcome: TaskResult<TResult>): Promise<void> {
    switch (outcome.status) {
      case 'success':
        this.succeeded++;
        break;
      case 'task_error':
        this.failed++;
        break;
      case 'timeout_error':
        this.failed++;
        this.timedOut++;
        break;
      case 'cancelled':
        this.cancelled++;
        break;
    }

    if (outcome.status !== 'success') {
      this.failures.push({
        identifier: outcome.identifier,
        payloadRef: outcome.payloadRef,
        status: outcome.status,
        message: outcome.message,
        timestamp: Date.now(),
      });
    }

    try {
      await this.ctx.checkpoint.updateProgress(
        outcome.identifier,
        isFailureStatus(outcome.status) ? ItemOutcome.FAILED : ItemOutcome.COMPLETED,
      );
    } catch (error) {
      this.ctx.logger.error({ err: error, identifier: outcome.identifier }, 'Failed to record outcome in checkpoint');
      this.persistenceError ??= toError(error);
    }
  }

  private async finalSave(): Promise<void> {
    try {
      await this.ctx.checkpoint.flush();
    } catch (error) {
      this.ctx.logger.error({ err: error, location: this.ctx.checkpoint.location }, 'Final checkpoint save failed');
      this.persistenceError ??= toError(error);
    }
  }

  private summarize(startedAt: number): RunSummary {
    return {
      total: this.seen,
      skipped: this.skipped,
      submitted: this.submitted,
      succeeded: this.succeeded,
      failed: this.failed,
      timedOut: this.timedOut,
      cancelled: this.cancelled,
      elapsedMs: Date.now() - startedAt,
      aborted: this.ctx.aborted,
      pool: this.ctx.pool.getStats(),
      progress: this.ctx.checkpoint.getProgressStats(),
      failures: [...this.failures],
    };
  }
}

function identifyString(item: unknown): string {
  if (typeof item === 'string') return item;
  throw new TypeError('Items that are not strings need an identify() option');
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(describeError(error));
}
