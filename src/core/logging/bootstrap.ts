import type { Logger } from './types.js';
import { createRootLogger } from './create-logger.js';

/**
 * Logger for code that runs before the container exists
 * (container setup itself, argv parsing).
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    _bootstrapLogger = createRootLogger();
  }
  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
