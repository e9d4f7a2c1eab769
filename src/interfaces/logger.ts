/**
 * Logger port. StructuredLogger implements it for the CLI; relay components
 * take one through their options and fall back to `noopLogger`.
 *
 * Context records carry a `component` key ("relay", "console", "tailer",
 * "http", ...) plus event-specific fields; an `Error` value is expanded by
 * the structured logger.
 * @module
 */

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug?(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}
