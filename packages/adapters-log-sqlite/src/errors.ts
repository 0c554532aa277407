/**
 * @module @logsink/adapters-log-sqlite/errors
 * Errors raised by the SQLite log handler.
 */

export type LogSinkErrorCode =
  | 'CONFIG_INVALID'
  | 'SCHEMA_INVALID'
  | 'CONNECTION_FAILED'
  | 'SERIALIZATION_FALLBACK'
  | 'RECORD_INVALID'
  | 'FLUSH_FAILED'
  | 'HANDLER_CLOSED'
  | 'HANDLER_NOT_READY';

/**
 * Base class of every handler error.
 */
export class LogSinkError extends Error {
  constructor(
    public readonly code: LogSinkErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'LogSinkError';
  }
}

/**
 * Handler configuration failed validation.
 */
export class ConfigError extends LogSinkError {
  constructor(public readonly issues: string[]) {
    super('CONFIG_INVALID', `Invalid log handler configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * The target table cannot be created or does not match the declared columns.
 */
export class SchemaError extends LogSinkError {
  constructor(message: string, options?: ErrorOptions) {
    super('SCHEMA_INVALID', message, options);
    this.name = 'SchemaError';
  }
}

/**
 * Opening a connection or applying its pragmas failed.
 */
export class ConnectionError extends LogSinkError {
  constructor(
    public readonly caller: string,
    options?: ErrorOptions,
  ) {
    super('CONNECTION_FAILED', `Failed to open SQLite connection for caller "${caller}"`, options);
    this.name = 'ConnectionError';
  }
}

/**
 * A value could not be serialized to JSON and was replaced by its string form.
 * Reported through `onSerializationFallback`, never thrown.
 */
export class SerializationError extends LogSinkError {
  constructor(
    public readonly path: string,
    public readonly fallback: string,
    reason: string,
  ) {
    super('SERIALIZATION_FALLBACK', `Value at "${path}" is not serializable (${reason}), stored as ${JSON.stringify(fallback)}`);
    this.name = 'SerializationError';
  }
}

/**
 * A log event cannot become a row, e.g. its level is not a known label or an integer.
 * Raised by `emit()` before the record reaches the buffer.
 */
export class RecordError extends LogSinkError {
  constructor(message: string) {
    super('RECORD_INVALID', message);
    this.name = 'RecordError';
  }
}

/**
 * A batch could not be written. The batch is dropped.
 */
export class FlushError extends LogSinkError {
  constructor(
    public readonly batchSize: number,
    options?: ErrorOptions,
  ) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('FLUSH_FAILED', `Failed to write batch of ${batchSize} log records${reason}`, options);
    this.name = 'FlushError';
  }
}

export class ClosedHandlerError extends LogSinkError {
  constructor(operation: string) {
    super('HANDLER_CLOSED', `Cannot ${operation}: log handler is closed`);
    this.name = 'ClosedHandlerError';
  }
}

export class HandlerNotReadyError extends LogSinkError {
  constructor(operation: string) {
    super('HANDLER_NOT_READY', `Cannot ${operation}: log handler is not initialized`);
    this.name = 'HandlerNotReadyError';
  }
}
