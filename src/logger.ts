/**
 * Structured Logger
 *
 * Leveled, structured logging for the link store components.
 * Outputs: [HH:MM:SS] [LEVEL] [component] message {fields}
 *
 * Payload plaintext and keys must never be passed as fields; handles are fine.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const LEVEL_LABELS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: 'DEBUG',
  info: 'INFO ',
  warn: 'WARN ',
  error: 'ERROR',
};

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(component: string): Logger;
}

export type LogSink = (level: Exclude<LogLevel, 'silent'>, line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  /** Where formatted lines go; defaults to the console */
  sink?: LogSink;
  /** Clock for timestamps */
  now?: () => Date;
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

export function formatLine(
  timestamp: Date,
  level: Exclude<LogLevel, 'silent'>,
  component: string,
  message: string,
  fields?: LogFields
): string {
  let line = `[${timestamp.toISOString().slice(11, 19)}] [${LEVEL_LABELS[level]}] [${component}] ${message}`;

  if (fields) {
    const sanitized: LogFields = {};
    for (const key of Object.keys(fields)) {
      const val = fields[key];
      if (val !== undefined && val !== null) {
        sanitized[key] = val instanceof Error ? val.message : val;
      }
    }
    if (Object.keys(sanitized).length > 0) {
      line += ` ${JSON.stringify(sanitized)}`;
    }
  }

  return line;
}

/**
 * Create a structured logger for a specific component.
 *
 * @example
 * ```typescript
 * const log = createLogger('link-service', { level: 'debug' });
 * log.info('Link created', { handle: 'aBc123xY' });
 * log.warn('Blob delete failed', { handle, error: err });
 * ```
 */
export function createLogger(component: string, options: LoggerOptions = {}): Logger {
  const minLevel = options.level ?? 'info';
  const sink = options.sink ?? consoleSink;
  const now = options.now ?? (() => new Date());

  function emit(level: Exclude<LogLevel, 'silent'>, message: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    sink(level, formatLine(now(), level, component, message, fields));
  }

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
    child: (name) => createLogger(`${component}:${name}`, options),
  };
}

/** A logger that drops everything. */
export const silentLogger: Logger = createLogger('silent', { level: 'silent' });
