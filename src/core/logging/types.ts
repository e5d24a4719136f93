import type { Logger as PinoLogger } from 'pino';

/**
 * pino's Logger, unwrapped. Data-first calls:
 *   logger.info({ pid: 4242 }, 'child spawned');
 *   logger.error({ err: error }, 'spawn failed');
 */
export type Logger = PinoLogger;

export interface ILoggerFactory {
  /** Child logger tagged with `component`. */
  create(component: string): Logger;

  readonly root: Logger;
}

export type LogLevel = 'silent' | 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace'];

export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export function parseLogLevel(raw: string | undefined): LogLevel {
  const wanted = raw?.trim().toLowerCase();
  return LOG_LEVELS.find(level => level === wanted) ?? DEFAULT_LOG_LEVEL;
}
