/**
 * Logger Module
 *
 * Centralized logging for the playlist and guide checker.
 */

export {
  Logger,
  createLogger,
  generateRunId,
  formatPrefix,
  shouldLog,
  logger,
  type LogLevel,
  type LogContext,
  type LogEntry,
} from './logger';
