/**
 * Scoped logger.
 * Writes to stderr: stdout carries the MCP stdio transport.
 */

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export type LogSink = (line: string, ...details: unknown[]) => void;

export interface LoggerOptions {
  /** Defaults to STREAMNET_LOG_LEVEL, then "info" */
  level?: LogLevel;
  /** Defaults to console.error */
  sink?: LogSink;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_RANK, value);
}

/**
 * Parse a level name, falling back to "info" for anything unrecognised.
 */
export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase() ?? "";
  return isLogLevel(normalized) ? normalized : "info";
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? parseLogLevel(process.env.STREAMNET_LOG_LEVEL);
  const sink: LogSink = options.sink ?? ((line, ...details) => console.error(line, ...details));
  const threshold = LEVEL_RANK[level];

  const emit = (at: Exclude<LogLevel, "silent">, message: string, details: unknown[]): void => {
    if (LEVEL_RANK[at] < threshold) return;
    const tag = at === "info" ? "" : ` ${at.toUpperCase()}`;
    sink(`[${scope}]${tag} ${message}`, ...details);
  };

  return {
    level,
    debug: (message, ...details) => emit("debug", message, details),
    info: (message, ...details) => emit("info", message, details),
    warn: (message, ...details) => emit("warn", message, details),
    error: (message, ...details) => emit("error", message, details),
  };
}
