export { BatchRunner } from './BatchRunner.js';
export type { BatchRunnerConfig } from './BatchRunner.js';
export type { RunSummary, FailureRecord } from './domain/model/RunSummary.js';
export type { ItemProcessor, RunOptions } from './domain/model/RunOptions.js';
export { loadRunnerConfig, RunnerEnvSchema, RunnerConfigError } from './config/loadRunnerConfig.js';
export type { RunnerConfig } from './config/loadRunnerConfig.js';
export { ErrorLogWriter, toErrorLogEntry } from './infrastructure/ErrorLogWriter.js';
export type { ErrorLogEntry } from './infrastructure/ErrorLogWriter.js';
