/**
 * Scoped, leveled logging.
 * Every line goes to stderr as "[scope] message": stdout carries the MCP
 * stdio transport.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  readonly scope: string;
  readonly level: LogLevel;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  /** Logger for a sub-scope, e.g. "model" -> "model:import". Keeps the level. */
  child(scope: string): Logger;
}

export type LogSink = (line: string, ...details: unknown[]) => void;

const stderrSink: LogSink = (line, ...details) => {
  console.error(line, ...details);
};

let defaultLevel: LogLevel = "info";

/**
 * Level used by loggers created without an explicit one.
 * Set once at start-up from configuration.
 */
export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

export function getDefaultLogLevel(): LogLevel {
  return defaultLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? stderrSink;
  const fixedLevel = options.level;
  const currentLevel = (): LogLevel => fixedLevel ?? defaultLevel;

  const write = (level: Exclude<LogLevel, "silent">, message: string, details: unknown[]) => {
    if (SEVERITY[level] < SEVERITY[currentLevel()]) return;
    const prefix = level === "info" ? `[${scope}]` : `[${scope}] ${level}:`;
    sink(`${prefix} ${message}`, ...details);
  };

  return {
    scope,
    get level() {
      return currentLevel();
    },
    debug: (message, ...details) => write("debug", message, details),
    info: (message, ...details) => write("info", message, details),
    warn: (message, ...details) => write("warn", message, details),
    error: (message, ...details) => write("error", message, details),
    child: (sub) => createLogger(`${scope}:${sub}`, { level: fixedLevel, sink }),
  };
}
