/**
 * Logging Module Index
 */

export {
  type LogLevel,
  type LogEntry,
  type LogFormatter,
  type LogTransport,
  type CostAnalyzerLogger,
  type LogContext,
  type LoggingOptions,
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  shouldLog,
  createDefaultFormatter,
  ConsoleTransport,
  FileTransport,
  MemoryTransport,
  CostAnalyzerLoggerImpl,
  createLogger,
  createSilentLogger,
} from "./logger.js";
