/**
 * Log levels for structured logging
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: string;
  data?: Record<string, unknown>;
  error?: Error;
}

/**
 * Logger interface that consumers can implement
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: Error, data?: Record<string, unknown>): void;
}

/**
 * Logger options
 */
export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Component name (e.g., 'PushEngine', 'FieldFallback') */
  context?: string;
  /** Custom log handler */
  handler?: (entry: LogEntry) => void;
  /** Enable logging (default: false in production) */
  enabled?: boolean;
}

/**
 * What components accept for their `logger` option: options for a new
 * logger, a ready logger, or `false` to silence the component.
 */
export type LoggerInput = LoggerOptions | Logger | false;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function defaultLogHandler(entry: LogEntry): void {
  const prefix = entry.context ? `[${entry.context}]` : '';
  const timestamp = new Date(entry.timestamp).toISOString();
  const dataStr = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  const line = `${timestamp} ${entry.level.toUpperCase()}${prefix} ${entry.message}${dataStr}`;

  switch (entry.level) {
    case 'debug':
      console.debug(line);
      break;
    case 'info':
      console.info(line);
      break;
    case 'warn':
      console.warn(line);
      break;
    case 'error':
      console.error(line, entry.error ?? '');
      break;
  }
}

/**
 * Create a structured logger
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', context: 'PullEngine' });
 * logger.info('Smart pull finished', { newEvents: 3 });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = 'info',
    context,
    handler = defaultLogHandler,
    enabled = process.env.NODE_ENV !== 'production',
  } = options;

  const minPriority = LOG_LEVEL_PRIORITY[level];

  function log(
    logLevel: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: Error
  ): void {
    if (!enabled || LOG_LEVEL_PRIORITY[logLevel] < minPriority) return;

    handler({
      level: logLevel,
      message,
      timestamp: Date.now(),
      context,
      data,
      error,
    });
  }

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, error, data) => log('error', message, data, error),
  };
}

/**
 * No-op logger that doesn't output anything
 */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

function isLogger(input: LoggerOptions | Logger): input is Logger {
  return (
    'debug' in input &&
    typeof input.debug === 'function' &&
    'error' in input &&
    typeof input.error === 'function'
  );
}

/**
 * Turn a component's `logger` option into a Logger. Options without a
 * context get the component name.
 */
export function resolveLogger(input: LoggerInput | undefined, context: string): Logger {
  if (input === false) return noopLogger;
  if (input === undefined) return createLogger({ context });
  if (isLogger(input)) return input;
  return createLogger({ ...input, context: input.context ?? context });
}
