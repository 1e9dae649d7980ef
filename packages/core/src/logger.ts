/**
 * Scoped loggers.
 *
 * Every line is written as `[handlekit/<scope>] LEVEL: message` to a single
 * process-wide writer (default: console.error). The threshold comes from
 * `log.level` in the unified config and is read on every call, so
 * `config.set()` takes effect immediately.
 *
 * @example
 * ```typescript
 * const log = createLogger("element");
 * log.debug(`installed destroy hook for ${handle}`);
 * ```
 */

import { config, type LogLevel } from "./config.js";

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export type LogWriter = (line: string) => void;

export interface Logger {
  readonly scope: string;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

const defaultWriter: LogWriter = (line) => console.error(line);
let writer: LogWriter = defaultWriter;

/**
 * Replace the process-wide log writer. Returns the previous writer.
 */
export function setLogWriter(next: LogWriter): LogWriter {
  const previous = writer;
  writer = next;
  return previous;
}

/** Restore the default console writer. */
export function resetLogWriter(): void {
  writer = defaultWriter;
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LEVEL_RANK;
}

/**
 * The level currently in effect. `debug: true` overrides `log.level`.
 */
export function currentLogLevel(): LogLevel {
  if (config.get("debug") === true) return "debug";
  const level = config.get("log.level");
  return isLogLevel(level) ? level : "warn";
}

function emit(scope: string, level: Exclude<LogLevel, "silent">, message: string): void {
  if (LEVEL_RANK[level] > LEVEL_RANK[currentLogLevel()]) return;
  writer(`[handlekit/${scope}] ${level.toUpperCase()}: ${message}`);
}

/**
 * Create a logger whose lines are tagged with `scope`.
 */
export function createLogger(scope: string): Logger {
  return {
    scope,
    error: (message) => emit(scope, "error", message),
    warn: (message) => emit(scope, "warn", message),
    info: (message) => emit(scope, "info", message),
    debug: (message) => emit(scope, "debug", message),
  };
}
