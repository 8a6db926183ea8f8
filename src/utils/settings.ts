/**
 * Log level resolution
 * Priority:
 * 1) --log-level <level>
 * 2) CSVSIEVE_LOG_LEVEL environment variable
 * 3) --verbose (debug)
 * 4) warn
 */

import { isLogLevel, type LogLevel } from './logger.js';

export const LOG_LEVEL_ENV = 'CSVSIEVE_LOG_LEVEL';

export interface LogLevelOptions {
  logLevel?: string; // --log-level argument
  verbose?: boolean;
}

export function resolveLogLevel(
  options: LogLevelOptions = {},
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  // Priority 1: --log-level argument
  if (options.logLevel && isLogLevel(options.logLevel)) {
    return options.logLevel;
  }

  // Priority 2: environment variable (unknown values are ignored)
  const envLevel = env[LOG_LEVEL_ENV]?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }

  // Priority 3: --verbose
  if (options.verbose) {
    return 'debug';
  }

  return 'warn';
}
