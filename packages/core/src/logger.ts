/**
 * @module @logsink/core/logger
 * Logger contract used by every adapter for its own diagnostics.
 */

/**
 * Structured logger.
 *
 * `meta` is merged into the emitted line; `child()` returns a logger whose
 * lines always carry `bindings`.
 */
export interface ILogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, error?: Error, meta?: Record<string, unknown>): void;
  child(bindings: Record<string, unknown>): ILogger;
}
