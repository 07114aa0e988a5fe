/**
 * Console logging with a `[lockstep/<scope>]` prefix.
 *
 * The level comes from the logger's own options, else from the shared
 * configuration, and is re-read on every call so `config.set()` takes
 * effect on loggers created earlier. Loggers only see configuration that
 * is already loaded or set; call `config.load()` at startup to apply
 * files and `LOCKSTEP_*` variables.
 */

import { config, type LogLevel } from "./config.js";

export type LogContext = Record<string, string | number | boolean | null>;

/** Logging levels that can be written (everything but "off"). */
export type WritableLevel = Exclude<LogLevel, "off">;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  /** True if a message at `level` would be written */
  isEnabled(level: WritableLevel): boolean;
}

export interface LoggerOptions {
  /** Fixed level for this logger (default: from config) */
  level?: LogLevel;
  /** Custom writer function (default: console.error / warn / info / debug by level) */
  writer?: (line: string) => void;
}

const SEVERITY: Record<LogLevel, number> = {
  off: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

// Reads loaded or set values only; never starts a file load
function effectiveLevel(options: LoggerOptions): LogLevel {
  if (options.level) return options.level;
  if (config.peek("debug")) return "debug";
  return config.peek("logLevel") ?? "warn";
}

function consoleWriter(level: WritableLevel): (line: string) => void {
  switch (level) {
    case "error":
      return (line) => console.error(line);
    case "warn":
      return (line) => console.warn(line);
    case "info":
      return (line) => console.info(line);
    case "debug":
      return (line) => console.debug(line);
  }
}

/** Render one log line. */
export function formatLogLine(
  scope: string,
  level: WritableLevel,
  message: string,
  context?: LogContext,
): string {
  const line = `[lockstep/${scope}] ${level.toUpperCase()}: ${message}`;
  return context === undefined ? line : `${line} ${JSON.stringify(context)}`;
}

/**
 * Create a logger for one package or module.
 *
 * @example
 * ```typescript
 * const log = createLogger("zip");
 * log.debug("second sequence exhausted first", { position: 3 });
 * // [lockstep/zip] DEBUG: second sequence exhausted first {"position":3}
 * ```
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const isEnabled = (level: WritableLevel): boolean =>
    SEVERITY[level] <= SEVERITY[effectiveLevel(options)];

  const emit = (level: WritableLevel, message: string, context?: LogContext): void => {
    if (!isEnabled(level)) return;
    const writer = options.writer ?? consoleWriter(level);
    writer(formatLogLine(scope, level, message, context));
  };

  return {
    error: (message, context) => emit("error", message, context),
    warn: (message, context) => emit("warn", message, context),
    info: (message, context) => emit("info", message, context),
    debug: (message, context) => emit("debug", message, context),
    isEnabled,
  };
}
