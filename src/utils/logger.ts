/**
 * Structured JSON logger
 *
 * Log format:
 * { timestamp, level, event, operation, entity_type, entity_id, ... }
 *
 * Writes to stderr by default so CLI stdout stays machine-readable.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  event: string;
  operation?: string;
  entity_type?: string;
  entity_id?: string | null;
  attributes?: string[];
  statement?: string;
  processed?: number;
  error?: string;
  [key: string]: unknown;
}

export type LogFields = Omit<LogEntry, 'timestamp' | 'level'>;

export interface Logger {
  debug(entry: LogFields): void;
  info(entry: LogFields): void;
  warn(entry: LogFields): void;
  error(entry: LogFields): void;
}

const writeStderr = (line: string): void => {
  process.stderr.write(line + '\n');
};

/**
 * Create a structured JSON logger
 * @param output Write function (default: stderr)
 * @param minLevel Minimum log level to output
 */
export function createLogger(
  output: (line: string) => void = writeStderr,
  minLevel: LogLevel = 'info'
): Logger {
  const levels: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };

  const log = (level: LogLevel, entry: LogFields) => {
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

/** Logger that drops everything (tests, embedding without logs) */
export const silentLogger: Logger = createLogger(() => {}, 'error');

/** Default logger instance */
export const logger = createLogger();
