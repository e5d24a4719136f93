export type { Logger, ILoggerFactory, LogLevel } from './types.js';
export { LOG_LEVELS, DEFAULT_LOG_LEVEL, parseLogLevel } from './types.js';

export { PinoLoggerFactory, createRootLogger } from './create-logger.js';

export { getBootstrapLogger, createBootstrapLogger } from './bootstrap.js';

export { REDACTION_CONFIG } from './redaction.js';
