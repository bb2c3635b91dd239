/**
 * Log levels
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error';

/**
 * Logger interface
 */
export interface Logger {
  trace(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger format
 */
export type LogFormat = 'pretty' | 'json';

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /**
   * Minimum log level to output
   * @default 'info'
   */
  level?: LogLevel;

  /**
   * Output format
   * @default 'pretty'
   */
  format?: LogFormat;

  /**
   * Custom prefix for all log messages
   * @default '[sockline]'
   */
  prefix?: string;

  /**
   * Whether to include timestamps
   * @default true
   */
  timestamp?: boolean;
}

const LEVELS: LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error'];

/**
 * Create a logger with the specified configuration
 *
 * @example
 * ```typescript
 * const logger = createLogger({ level: 'debug', prefix: '[sockline] TCP(localhost:5025)' });
 * logger.debug('[I] writeThenReadLine', summarize('*idn?\n'));
 * ```
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const { level = 'info', format = 'pretty', prefix = '[sockline]', timestamp = true } = config;

  const minLevelIndex = LEVELS.indexOf(level);

  const shouldLog = (logLevel: LogLevel): boolean => {
    return LEVELS.indexOf(logLevel) >= minLevelIndex;
  };

  const log = (
    logLevel: LogLevel,
    consoleFn: (...args: unknown[]) => void,
    message: string,
    args: unknown[]
  ): void => {
    if (!shouldLog(logLevel)) {
      return;
    }

    if (format === 'json') {
      consoleFn(
        JSON.stringify({
          timestamp: timestamp ? new Date().toISOString() : undefined,
          level: logLevel,
          prefix,
          message,
          data: args.length > 0 ? args.map(toJSONSafe) : undefined,
        })
      );
      return;
    }

    // Pretty format
    const parts: string[] = [];

    if (timestamp) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(prefix);
    parts.push(`[${logLevel.toUpperCase()}]`);
    parts.push(message);

    consoleFn(parts.join(' '), ...args);
  };

  return {
    trace: (message: string, ...args: unknown[]) => {
      log('trace', console.log, message, args);
    },

    debug: (message: string, ...args: unknown[]) => {
      log('debug', console.log, message, args);
    },

    info: (message: string, ...args: unknown[]) => {
      log('info', console.log, message, args);
    },

    warn: (message: string, ...args: unknown[]) => {
      log('warn', console.warn, message, args);
    },

    error: (message: string, ...args: unknown[]) => {
      log('error', console.error, message, args);
    },
  };
}

/**
 * Pick the logger for a component: an explicit logger wins, then the debug
 * flag. Without either, only errors are printed.
 */
export function resolveLogger(
  options: { logger?: Logger; debug?: boolean },
  prefix?: string
): Logger {
  if (options.logger) {
    return options.logger;
  }
  return createLogger({ level: options.debug ? 'debug' : 'error', prefix });
}

const SUMMARY_LIMIT = 80;

/**
 * Render a payload for a log line, truncated so large binary blocks stay readable.
 *
 * Byte arrays are rendered as latin1 text; strings and bytes are quoted with `'`.
 */
export function summarize(value: unknown): string {
  const text = render(value);
  return text.length < SUMMARY_LIMIT ? text : `${text.slice(0, 74)}[...]'`;
}

function render(value: unknown): string {
  if (value instanceof Uint8Array) {
    return quote(Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('latin1'));
  }
  if (typeof value === 'string') {
    return quote(value);
  }
  if (Array.isArray(value)) {
    return `[${value.map(render).join(', ')}]`;
  }
  return String(value);
}

function quote(text: string): string {
  return `'${JSON.stringify(text).slice(1, -1)}'`;
}

function toJSONSafe(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (value instanceof Uint8Array) {
    return summarize(value);
  }
  return value;
}

/**
 * No-op logger that does nothing
 * Useful for disabling logging
 */
export const noopLogger: Logger = {
  trace: () => {},
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
