/**
 * Logging Module Index
 */

export {
  type LogLevel,
  type LogEntry,
  type LogFormatter,
  type LogTransport,
  type Logger,
  type LogContext,
  LOG_LEVELS,
  isLogLevel,
  shouldLog,
  createDefaultFormatter,
  ConsoleTransport,
  MemoryTransport,
  StructuredLogger,
  createLogger,
  createSilentLogger,
} from "./logger.js";
