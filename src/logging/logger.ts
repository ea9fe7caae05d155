/**
 * Lightweight logging utility.
 * Writes timestamped lines tagged with the run ID to the console and,
 * optionally, to a log file.
 */

import { appendFileSync, mkdirSync, existsSync } from "node:fs";
import { dirname } from "node:path";
import { getRunId } from "./run-id.js";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export type LogContext = Record<string, unknown>;

/** Receives every formatted line that passes the level filter. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** Minimum log level to output */
  level?: LogLevel;
  /** Append lines to this file; no file output when null */
  file?: string | null;
  /** Enable console output */
  console?: boolean;
  /** Extra destination, used by tests to capture output */
  sink?: LogSink;
  /** Context merged into every entry */
  bindings?: LogContext;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Derive a logger that adds `bindings` to every entry. */
  child(bindings: LogContext): Logger;
}

/**
 * Format a log entry with timestamp, level, run ID, and message.
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  now: Date = new Date()
): string {
  const runId = getRunId() ?? "no-run-id";
  const levelStr = level.toUpperCase().padEnd(5);

  let entry = `[${now.toISOString()}] [${levelStr}] [${runId}] ${message}`;

  if (context && Object.keys(context).length > 0) {
    entry += ` ${JSON.stringify(context, errorReplacer)}`;
  }

  return entry;
}

function errorReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

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
  const level = options.level ?? "info";
  const file = options.file ?? null;
  const toConsole = options.console ?? true;
  const bindings = options.bindings ?? {};

  if (file !== null && !existsSync(dirname(file))) {
    mkdirSync(dirname(file), { recursive: true });
  }

  function log(entryLevel: LogLevel, message: string, context?: LogContext): void {
    if (LOG_LEVEL_PRIORITY[entryLevel] < LOG_LEVEL_PRIORITY[level]) {
      return;
    }

    const merged = context ? { ...bindings, ...context } : bindings;
    const entry = formatLogEntry(entryLevel, message, merged);

    if (toConsole) {
      getConsoleMethod(entryLevel)(entry);
    }

    options.sink?.(entryLevel, entry);

    if (file !== null) {
      try {
        appendFileSync(file, entry + "\n");
      } catch (err) {
        // Fallback to console if file write fails
        console.error(`Failed to write to log file ${file}: ${String(err)}`);
      }
    }
  }

  return {
    debug: (message, context) => log("debug", message, context),
    info: (message, context) => log("info", message, context),
    warn: (message, context) => log("warn", message, context),
    error: (message, context) => log("error", message, context),
    child: (extra) => createLogger({ ...options, bindings: { ...bindings, ...extra } }),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger({ console: false, level: "error", sink: () => {} });
