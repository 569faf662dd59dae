/**
 * Minimal structured logger interface.
 * StructuredLogger implements it; buffers only ever see this shape.
 * @module
 */

export type LogContext = Record<string, unknown>;

/** Structured logger with optional debug level. */
export interface Logger {
  debug?(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}

/** Structural check used when a logger arrives through untyped options. */
export function isLogger(value: unknown): value is Logger {
  if (typeof value !== "object" || value === null) return false;
  return (
    "info" in value &&
    typeof value.info === "function" &&
    "warn" in value &&
    typeof value.warn === "function" &&
    "error" in value &&
    typeof value.error === "function" &&
    (!("debug" in value) || value.debug === undefined || typeof value.debug === "function")
  );
}
