/**
 * Lightweight structured logger.
 *
 * Provides log-level filtering and structured output:
 * - Production (NODE_ENV=production): JSON lines for machine consumption
 * - Development: Pretty-printed human-readable output
 *
 * When LOG_FILE is set, every emitted line is also appended to that file
 * (the directory is created on first write).
 *
 * Log levels (in order of severity): debug < info < warn < error
 * Set LOG_LEVEL env var to control minimum verbosity (default: "info").
 *
 * Usage:
 *   import { logger } from "../config/logger";
 *   logger.info("server", "Server started", { port: 8000 });
 *   logger.error("upstream", "Request failed", { error: message });
 */

import * as fs from "fs";
import * as path from "path";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

type LogLevel = "debug" | "info" | "warn" | "error";

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  component: string;
  message: string;
  [key: string]: unknown;
}

// ---------------------------------------------------------------------------
// Level hierarchy
// ---------------------------------------------------------------------------

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_PRIORITY;
}

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

function getLogLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

function isProduction(): boolean {
  return process.env.NODE_ENV === "production";
}

// ---------------------------------------------------------------------------
// File sink
// ---------------------------------------------------------------------------

let fileStream: fs.WriteStream | null = null;
let fileStreamPath = "";

function getFileStream(): fs.WriteStream | null {
  const target = process.env.LOG_FILE || "";
  if (!target) {
    return null;
  }
  if (fileStream && fileStreamPath === target) {
    return fileStream;
  }

  fs.mkdirSync(path.dirname(path.resolve(target)), { recursive: true });
  fileStream?.end();
  fileStream = fs.createWriteStream(target, { flags: "a" });
  fileStreamPath = target;
  fileStream.on("error", (err) => {
    console.error(`[logger] ERROR Log file unavailable ${JSON.stringify({ file: target, error: err.message })}`);
    fileStream = null;
    fileStreamPath = "";
  });
  return fileStream;
}

// ---------------------------------------------------------------------------
// Formatting
// ---------------------------------------------------------------------------

function formatPretty(entry: LogEntry): string {
  const { timestamp: _ts, level, component, message, ...extra } = entry;
  const extraStr =
    Object.keys(extra).length > 0 ? " " + JSON.stringify(extra) : "";
  return `[${component}] ${level.toUpperCase()} ${message}${extraStr}`;
}

function formatJson(entry: LogEntry): string {
  return JSON.stringify(entry);
}

// ---------------------------------------------------------------------------
// Core log function
// ---------------------------------------------------------------------------

function log(
  level: LogLevel,
  component: string,
  message: string,
  extra?: Record<string, unknown>
): void {
  const minLevel = getLogLevel();
  if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[minLevel]) {
    return;
  }

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    component,
    message,
    ...extra,
  };

  const formatted = isProduction() ? formatJson(entry) : formatPretty(entry);

  switch (level) {
    case "error":
      console.error(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    case "debug":
      console.debug(formatted);
      break;
    default:
      console.log(formatted);
  }

  // The file always gets JSON lines with timestamps, whatever the console format
  getFileStream()?.write(formatJson(entry) + "\n");
}

/**
 * Flush and close the log file, if one is open. Call during shutdown.
 */
function closeLogFile(): Promise<void> {
  const stream = fileStream;
  fileStream = null;
  fileStreamPath = "";
  if (!stream) {
    return Promise.resolve();
  }
  return new Promise((resolve) => stream.end(() => resolve()));
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

const logger = {
  debug(component: string, message: string, extra?: Record<string, unknown>): void {
    log("debug", component, message, extra);
  },

  info(component: string, message: string, extra?: Record<string, unknown>): void {
    log("info", component, message, extra);
  },

  warn(component: string, message: string, extra?: Record<string, unknown>): void {
    log("warn", component, message, extra);
  },

  error(component: string, message: string, extra?: Record<string, unknown>): void {
    log("error", component, message, extra);
  },
};

export { logger, closeLogFile };
export type { LogLevel, LogEntry };
