/**
 * Centralized Logger
 *
 * Structured, levelled console logging for the checker library and scripts.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogContext {
  /** Service or module name */
  service?: string;
  /** Run ID for correlating one analysis */
  runId?: string;
  /** Additional metadata */
  [key: string]: unknown;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  data?: unknown;
}

/**
 * Get the current log level from environment
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel === 'debug' || envLevel === 'info' || envLevel === 'warn' || envLevel === 'error') {
    return envLevel;
  }
  // Analysis runs are chatty at debug; keep them quiet unless asked
  return process.env.NODE_ENV === 'development' ? 'debug' : 'info';
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Check if a log level should be output
 */
export function shouldLog(level: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[getLogLevel()];
}

/**
 * Format error for logging
 * Handles both Error instances and plain values
 */
function formatError(error: unknown): LogEntry['error'] | undefined {
  if (!error) return undefined;

  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  if (typeof error === 'object') {
    return {
      name: 'UnknownError',
      message: JSON.stringify(error),
    };
  }

  return {
    name: 'UnknownError',
    message: String(error),
  };
}

function createLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  error?: unknown,
  data?: unknown
): LogEntry {
  return {
    timestamp: new Date().toISOString(),
    level,
    message,
    context,
    error: formatError(error),
    data,
  };
}

/**
 * Build the single-line prefix for an entry, e.g. `[checker][FixApplicator][run:abc]`
 */
export function formatPrefix(context?: LogContext): string {
  const serviceStr = context?.service ? `[${context.service}]` : '';
  const runIdStr = context?.runId ? `[run:${context.runId}]` : '';
  return `[checker]${serviceStr}${runIdStr}`;
}

/**
 * Output log entry to console
 */
function outputLog(entry: LogEntry): void {
  const logArgs: unknown[] = [`${formatPrefix(entry.context)} ${entry.message}`];

  if (entry.data !== undefined) {
    logArgs.push('\nData:', entry.data);
  }

  if (entry.error) {
    logArgs.push('\nError:', entry.error);
  }

  if (entry.context) {
    // service and runId are already in the prefix
    const { service: _service, runId: _runId, ...restContext } = entry.context;
    if (Object.keys(restContext).length > 0) {
      logArgs.push('\nContext:', restContext);
    }
  }

  switch (entry.level) {
    case 'debug':
      console.debug(...logArgs);
      break;
    case 'info':
      console.info(...logArgs);
      break;
    case 'warn':
      console.warn(...logArgs);
      break;
    case 'error':
      console.error(...logArgs);
      break;
  }
}

/**
 * Logger class for creating scoped loggers
 */
export class Logger {
  private context: LogContext;

  constructor(context: LogContext = {}) {
    this.context = context;
  }

  /**
   * Create a child logger with additional context
   */
  child(additionalContext: LogContext): Logger {
    return new Logger({
      ...this.context,
      ...additionalContext,
    });
  }

  debug(message: string, data?: unknown): void {
    if (!shouldLog('debug')) return;
    outputLog(createLogEntry('debug', message, this.context, undefined, data));
  }

  info(message: string, data?: unknown): void {
    if (!shouldLog('info')) return;
    outputLog(createLogEntry('info', message, this.context, undefined, data));
  }

  warn(message: string, data?: unknown): void {
    if (!shouldLog('warn')) return;
    outputLog(createLogEntry('warn', message, this.context, undefined, data));
  }

  error(message: string, error?: unknown, data?: unknown): void {
    if (!shouldLog('error')) return;
    outputLog(createLogEntry('error', message, this.context, error, data));
  }

  /**
   * Time a synchronous operation, logging start and completion at debug level
   */
  withTiming<T>(operationName: string, fn: () => T, data?: Record<string, unknown>): T {
    const startTime = Date.now();
    this.debug(`Starting: ${operationName}`, data);
    try {
      const result = fn();
      this.debug(`Completed: ${operationName}`, { duration: `${Date.now() - startTime}ms`, ...data });
      return result;
    } catch (error) {
      this.error(`Failed: ${operationName}`, error, data);
      throw error;
    }
  }
}

/**
 * Create a logger for a specific service
 */
export function createLogger(service: string): Logger {
  return new Logger({ service });
}

/**
 * Generate a short ID for correlating the log lines of one run
 */
export function generateRunId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 9)}`;
}

/**
 * Default logger instance
 */
export const logger = new Logger();
