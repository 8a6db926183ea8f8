/**
 * Structured JSON logger
 *
 * Log format:
 * { timestamp, level, event, ... }
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  file?: string;
  rows_in?: number;
  rows_out?: number;
  columns?: number;
  filters?: number;
  latency_ms?: number;
  error?: string;
  code?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(entry: Omit<LogEntry, 'timestamp' | 'level'>): void;
  info(entry: Omit<LogEntry, 'timestamp' | 'level'>): void;
  warn(entry: Omit<LogEntry, 'timestamp' | 'level'>): void;
  error(entry: Omit<LogEntry, 'timestamp' | 'level'>): void;
}

const writeStderr = (line: string): void => {
  process.stderr.write(line + '\n');
};

/**
 * Create a structured JSON logger
 * @param output Write function (default: stderr, so stdout stays pure CSV)
 * @param minLevel Minimum log level to output
 */
export function createLogger(
  output: (line: string) => void = writeStderr,
  minLevel: LogLevel = 'warn'
): Logger {
  const levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  const log = (level: LogLevel, entry: Omit<LogEntry, 'timestamp' | 'level'>) => {
    if (levels[level] < levels[minLevel]) return;

    const fullEntry = {
      timestamp: new Date().toISOString(),
      level,
      ...entry,
    };

    output(JSON.stringify(fullEntry));
  };

  return {
    debug: (entry) => log('debug', entry),
    info: (entry) => log('info', entry),
    warn: (entry) => log('warn', entry),
    error: (entry) => log('error', entry),
  };
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}
