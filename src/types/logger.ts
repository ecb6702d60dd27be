/**
 * Logger type definitions
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Structured fields appended to a log line as JSON */
export type LogMeta = Record<string, unknown>;

/**
 * Same shape as the module-level functions in @/logger, for loggers bound
 * to a context with `withContext`.
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}
