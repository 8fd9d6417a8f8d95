import chalk from "chalk";
import { ENV } from "./env.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelWeight: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

const LOG_LEVELS: readonly string[] = Object.keys(levelWeight);

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.includes(value);
}

let activeLevel: LogLevel = isLogLevel(ENV.LOG_LEVEL) ? ENV.LOG_LEVEL : "info";

const formatters: Record<LogLevel, (message: string) => string> = {
  debug: message => chalk.gray(`[DEBUG] ${message}`),
  info: message => chalk.blue(`[INFO] ${message}`),
  warn: message => chalk.yellow(`[WARN] ${message}`),
  error: message => chalk.red(`[ERROR] ${message}`)
};

function shouldLog(level: LogLevel): boolean {
  return levelWeight[level] >= levelWeight[activeLevel];
}

// Every level goes to stderr: in bridge mode stdout is the HTTP response.
function emit(level: LogLevel, message: string): void {
  if (shouldLog(level)) {
    console.error(formatters[level](message));
  }
}

/**
 * Set log level for runtime diagnostics.
 *
 * @param level - Desired logging level.
 * @throws Error if level is not recognised.
 */
export function setLogLevel(level: string): void {
  if (!isLogLevel(level)) {
    throw new Error(`Unsupported log level: ${level}`);
  }
  activeLevel = level;
}

/**
 * Emit information-level log entry.
 *
 * Invariant: one line per accepted or rejected request, readable in the journal.
 *
 * @param message - Log message text.
 */
export function info(message: string): void {
  emit("info", message);
}

/**
 * Emit debug-level log entry.
 *
 * @param message - Detailed diagnostic message.
 */
export function debug(message: string): void {
  emit("debug", message);
}

export function warn(message: string): void {
  emit("warn", message);
}

/**
 * Emit error-level log entry.
 *
 * @param message - Description of encountered error.
 */
export function error(message: string): void {
  emit("error", message);
}
