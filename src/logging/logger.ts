/**
 * Lightweight logging utility.
 * Outputs to console and, optionally, a log file. Every line carries a
 * timestamp, the run ID and the pipeline stage (scope) that emitted it.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { getRunId } from "./run-id.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * A single structured log record, handed to sinks before formatting.
 */
export interface LogEntry {
  readonly timestamp: string;
  readonly level: LogLevel;
  readonly runId: string;
  readonly scope?: string;
  readonly message: string;
  readonly context?: Record<string, unknown>;
}

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Stage or component name prefixed to each message */
  scope?: string;
  /** Directory for log files */
  logDir?: string;
  /** Log file name (without path) */
  logFile?: string;
  /** Enable console output */
  console?: boolean;
  /** Enable file output */
  file?: boolean;
  /** Receives every entry that passes the level filter */
  sink?: (entry: LogEntry) => void;
}

type ResolvedOptions = Required<Omit<LoggerOptions, "scope" | "sink">> &
  Pick<LoggerOptions, "scope" | "sink">;

const DEFAULT_OPTIONS: ResolvedOptions = {
  level: "info",
  logDir: "output/logs",
  logFile: "handbook-graph.log",
  console: true,
  file: false,
};

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  /** Derive a logger for a sub-stage, e.g. "pipeline:resolver". */
  child(scope: string): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Format a log entry as a single line.
 *
 * @example
 *   [2024-01-15T10:00:00.000Z] [INFO ] [20240115-a1b2c3] [validator] 4 checks run {"errors":0}
 */
export function formatLogEntry(entry: LogEntry): string {
  const levelStr = entry.level.toUpperCase().padEnd(5);
  const scopeStr = entry.scope ? ` [${entry.scope}]` : "";

  let line = `[${entry.timestamp}] [${levelStr}] [${entry.runId}]${scopeStr} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${JSON.stringify(entry.context)}`;
  }

  return line;
}

/**
 * Get console method for log level.
 */
function getConsoleMethod(level: LogLevel): typeof console.log {
  switch (level) {
    case "debug":
      return console.debug;
    case "info":
      return console.info;
    case "warn":
      return console.warn;
    case "error":
      return console.error;
  }
}

/**
 * Create a logger instance.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const opts: ResolvedOptions = { ...DEFAULT_OPTIONS, ...options };
  const logFilePath = join(opts.logDir, opts.logFile);

  if (opts.file && !existsSync(opts.logDir)) {
    mkdirSync(opts.logDir, { recursive: true });
  }

  function log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>
  ): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[opts.level]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      runId: getRunId() ?? "no-run-id",
      scope: opts.scope,
      message,
      context,
    };

    opts.sink?.(entry);

    if (!opts.console && !opts.file) {
      return;
    }

    const line = formatLogEntry(entry);

    if (opts.console) {
      getConsoleMethod(level)(line);
    }

    if (opts.file) {
      try {
        appendFileSync(logFilePath, line + "\n");
      } catch (err) {
        // Fall back to console if the file is not writable
        console.error(`Failed to write to log file: ${err}`);
      }
    }
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (scope) =>
      createLogger({
        ...options,
        scope: opts.scope ? `${opts.scope}:${scope}` : scope,
      }),
  };
}

/**
 * Logger that drops everything. Used as the default for library calls
 * made without an explicit logger.
 */
export function createSilentLogger(): Logger {
  return createLogger({ console: false, file: false });
}
