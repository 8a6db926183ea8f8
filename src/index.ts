/**
 * csvsieve
 * Programmatic API exports
 */

export * from './sieve/index.js';

// Logging
export type { Logger, LogEntry, LogLevel } from './utils/logger.js';
export { createLogger, isLogLevel, LOG_LEVELS } from './utils/logger.js';
export { resolveLogLevel, LOG_LEVEL_ENV } from './utils/settings.js';

// CLI
export { createProgram } from './cli.js';
