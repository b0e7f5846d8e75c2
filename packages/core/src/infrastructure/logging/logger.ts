import { pino } from 'pino';
import type { Logger, LevelWithSilentOrString } from 'pino';

export type { Logger } from 'pino';

export interface LoggerOptions {
  /** Logger name attached to every line. Default: `'batchpool'`. */
  readonly name?: string;
  /** Minimum level. Default: `LOG_LEVEL` from the environment, else `'info'`. */
  readonly level?: LevelWithSilentOrString;
}

/** Create a JSON logger writing to stdout. */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'batchpool',
    level: options.level ?? process.env['LOG_LEVEL'] ?? 'info',
  });
}

let rootLogger: Logger | null = null;

/** Shared root logger, created on first use. Components log through children of it. */
export function getRootLogger(): Logger {
  rootLogger ??= createLogger();
  return rootLogger;
}
