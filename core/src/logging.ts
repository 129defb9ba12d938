/**
 * Structured logging for tabnest
 *
 * The engine never prints directly. Every public operation takes an optional
 * {@link Logger}; soft conditions such as unknown filter columns are reported
 * through `warn`, per-call summaries through `debug`.
 *
 * @example
 * ```typescript
 * import { createConsoleLogger, withContext, transform } from '@tabnest/core';
 *
 * const logger = withContext(createConsoleLogger({ format: 'json' }), { service: 'metrics-map' });
 * transform(table, { hierarchy: ['GROUP', 'CODE'], logger });
 * ```
 */

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * JSON-compatible value allowed in log context
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context data attached to log entries.
 */
export interface LogContext {
  /** Service or component name */
  service?: string;
  /** Operation being performed (filter, transform, lookup, ...) */
  operation?: string;
  /** Column the entry refers to */
  column?: string;
  /** Filter operator the entry refers to */
  operator?: string;
  /** Rows entering the operation */
  rowsIn?: number;
  /** Rows surviving the operation */
  rowsOut?: number;
  /** Duration in milliseconds */
  durationMs?: number;
  /** Error code for error logs */
  errorCode?: string;
  [key: string]: LogContextValue | undefined;
}

/**
 * Type guard for JSON-compatible context values.
 */
export function isLogContextValue(value: unknown): value is LogContextValue {
  if (value === null) return true;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isLogContextValue);
  }
  if (typeof value === 'object') {
    return Object.values(value).every(isLogContextValue);
  }
  return false;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

/**
 * Logger interface - the core abstraction for logging
 */
export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface LoggerConfig {
  /** Minimum log level to emit (default: 'debug') */
  minLevel?: LogLevel;
  /** Sink for emitted entries */
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends LoggerConfig {
  /** 'json' for structured lines, 'pretty' for humans (default: 'json') */
  format?: 'json' | 'pretty';
}

/**
 * Logger that keeps entries in memory for assertions
 */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const LogLevels = {
  DEBUG: 'debug' as const,
  INFO: 'info' as const,
  WARN: 'warn' as const,
  ERROR: 'error' as const,

  order(level: LogLevel): number {
    return LOG_LEVEL_ORDER[level];
  },

  isAtLeast(level: LogLevel, minLevel: LogLevel): boolean {
    return LOG_LEVEL_ORDER[level] >= LOG_LEVEL_ORDER[minLevel];
  },

  isLogLevel(value: string): value is LogLevel {
    return Object.prototype.hasOwnProperty.call(LOG_LEVEL_ORDER, value);
  },
};

// =============================================================================
// Logger Factory Functions
// =============================================================================

/**
 * Create a logger that filters by level and hands entries to `output`.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? 'debug';
  const output = config.output ?? (() => {});

  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (!LogLevels.isAtLeast(level, minLevel)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
    };

    if (context !== undefined) {
      entry.context = context;
    }

    if (error !== undefined) {
      entry.error = error;
    }

    output(entry);
  };

  return {
    debug(message: string, context?: LogContext): void {
      log('debug', message, context);
    },
    info(message: string, context?: LogContext): void {
      log('info', message, context);
    },
    warn(message: string, context?: LogContext): void {
      log('warn', message, context);
    },
    error(message: string, error?: Error, context?: LogContext): void {
      log('error', message, context, error);
    },
  };
}

/**
 * Render a log entry as a single JSON line or a human-readable line.
 */
export function formatLogEntry(entry: LogEntry, format: 'json' | 'pretty'): string {
  if (format === 'json') {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: {
          name: entry.error.name,
          message: entry.error.message,
          stack: entry.error.stack,
        },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  const levelUpper = entry.level.toUpperCase().padEnd(5);
  let output = `[${time}] ${levelUpper} ${entry.message}`;

  if (entry.context) {
    output += ` ${JSON.stringify(entry.context)}`;
  }

  if (entry.error) {
    output += `\n  Error: ${entry.error.message}`;
  }

  return output;
}

/**
 * Create a logger writing to the console.
 *
 * @example
 * ```typescript
 * const devLogger = createConsoleLogger({ format: 'pretty', minLevel: 'debug' });
 * ```
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? 'json';

  return createLogger({
    ...config,
    output: (entry) => {
      console.log(formatLogEntry(entry, format));
    },
  });
}

/**
 * Create a logger that discards everything
 */
export function createNoopLogger(): Logger {
  return {
    debug(): void {},
    info(): void {},
    warn(): void {},
    error(): void {},
  };
}

/**
 * Create a logger that captures entries for assertions.
 *
 * @example
 * ```typescript
 * const logger = createTestLogger();
 * filterTable(table, { MISSING: 1 }, logger);
 * expect(logger.getLogsByLevel('warn')).toHaveLength(1);
 * ```
 */
export function createTestLogger(config: LoggerConfig = {}): TestLogger {
  const logs: LogEntry[] = [];
  const inner = createLogger({
    minLevel: config.minLevel,
    output: (entry) => {
      logs.push(entry);
      config.output?.(entry);
    },
  });

  return {
    ...inner,
    getLogs(): LogEntry[] {
      return [...logs];
    },
    getLogsByLevel(level: LogLevel): LogEntry[] {
      return logs.filter(entry => entry.level === level);
    },
    clear(): void {
      logs.length = 0;
    },
  };
}

// =============================================================================
// Child Logger / Context
// =============================================================================

/**
 * Create a child logger that merges `context` into every entry.
 * Context given at log time wins over the bound context.
 */
export function withContext(logger: Logger, context: LogContext): Logger {
  const mergeContext = (localContext?: LogContext): LogContext => {
    if (localContext === undefined) {
      return context;
    }
    return { ...context, ...localContext };
  };

  return {
    debug(message: string, localContext?: LogContext): void {
      logger.debug(message, mergeContext(localContext));
    },
    info(message: string, localContext?: LogContext): void {
      logger.info(message, mergeContext(localContext));
    },
    warn(message: string, localContext?: LogContext): void {
      logger.warn(message, mergeContext(localContext));
    },
    error(message: string, error?: Error, localContext?: LogContext): void {
      logger.error(message, error, mergeContext(localContext));
    },
  };
}

// =============================================================================
// Default Logger
// =============================================================================

let defaultLogger: Logger = createConsoleLogger({ format: 'pretty', minLevel: 'warn' });

/**
 * Logger used when an operation is called without one.
 */
export function getDefaultLogger(): Logger {
  return defaultLogger;
}

/**
 * Replace the process-wide default logger. Returns the previous one.
 */
export function setDefaultLogger(logger: Logger): Logger {
  const previous = defaultLogger;
  defaultLogger = logger;
  return previous;
}
