import { z } from 'zod';
import {
  DEFAULT_AUTO_SAVE_INTERVAL,
  DEFAULT_CHECKPOINT_FILE,
  DEFAULT_POOL_CAPACITY,
  DEFAULT_TASK_TIMEOUT_MS,
  MAX_TIMEOUT_MS,
} from '@batchpool/core';

const TRUE_VALUES = ['true', '1', 'yes'];

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => TRUE_VALUES.includes(value));

export const RunnerEnvSchema = z.object({
  BATCHPOOL_CONCURRENCY: z.coerce.number().int().positive().default(DEFAULT_POOL_CAPACITY),
  BATCHPOOL_TASK_TIMEOUT_MS: z.coerce.number().positive().max(MAX_TIMEOUT_MS).default(DEFAULT_TASK_TIMEOUT_MS),
  BATCHPOOL_CHECKPOINT_FILE: z.string().default(DEFAULT_CHECKPOINT_FILE),
  BATCHPOOL_AUTO_SAVE_INTERVAL: z.coerce.number().int().positive().default(DEFAULT_AUTO_SAVE_INTERVAL),
  BATCHPOOL_ERROR_LOG: z.string().optional(),
  BATCHPOOL_FORCE_RERUN: booleanFlag.default('false'),
});

/** Runner settings resolved from the environment. */
export interface RunnerConfig {
  readonly concurrency: number;
  readonly taskTimeoutMs: number;
  readonly checkpointFile: string;
  readonly autoSaveInterval: number;
  readonly errorLogPath?: string;
  readonly forceRerun: boolean;
}

/** Raised when an environment variable does not hold a usable value. */
export class RunnerConfigError extends Error {
  constructor(readonly issues: readonly string[]) {
    super(`Invalid runner configuration: ${issues.join('; ')}`);
    this.name = 'RunnerConfigError';
  }
}

/**
 * Read `BATCHPOOL_*` variables. Empty values count as unset.
 *
 * @throws RunnerConfigError listing every invalid variable.
 */
export function loadRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''));
  const result = RunnerEnvSchema.safeParse(present);

  if (!result.success) {
    throw new RunnerConfigError(result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  const data = result.data;

  return {
    concurrency: data.BATCHPOOL_CONCURRENCY,
    taskTimeoutMs: data.BATCHPOOL_TASK_TIMEOUT_MS,
    checkpointFile: data.BATCHPOOL_CHECKPOINT_FILE,
    autoSaveInterval: data.BATCHPOOL_AUTO_SAVE_INTERVAL,
    errorLogPath: data.BATCHPOOL_ERROR_LOG,
    forceRerun: data.BATCHPOOL_FORCE_RERUN,
  };
}
