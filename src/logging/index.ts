/**
 * Logging and run tracing utilities.
 */

export { generateRunId, initRunId, getRunId, resetRunId } from "./run-id.js";
export {
  createLogger,
  createSilentLogger,
  formatLogEntry,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogEntry,
  type LogLevel,
  type LoggerOptions,
} from "./logger.js";
