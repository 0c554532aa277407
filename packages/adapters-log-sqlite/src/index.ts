/**
 * @module @logsink/adapters-log-sqlite
 * Buffered SQLite sink for structured log records.
 *
 * Features:
 * - Automatic schema initialization with caller-declared extra columns
 * - Batch writes on a size threshold and on a timer
 * - One WAL-tuned connection per caller
 * - Canonical JSON for extra data, string fallback for unserializable values
 *
 * @example
 * ```typescript
 * import { createHandler } from '@logsink/adapters-log-sqlite';
 *
 * const handler = await createHandler({
 *   path: '.data/logs.db',
 *   capacity: 500,
 *   flushInterval: 2,
 *   additionalFields: [{ name: 'request_id', type: 'TEXT' }],
 * });
 *
 * await handler.emit({
 *   level: 'info',
 *   loggerName: 'http',
 *   message: 'GET %s -> %d',
 *   args: ['/health', 200],
 *   extra: { request_id: 'req-1', durationMs: 3 },
 * });
 *
 * await handler.close();
 * ```
 */

import { SQLiteLogHandler, type LogHandlerDeps } from './handler.js';
import type { LogHandlerConfig } from './config.js';

export { SQLiteLogHandler } from './handler.js';
export type { HandlerState, HandlerStats, LogHandlerDeps } from './handler.js';
export { RecordBuffer } from './buffer.js';
export type { BatchSink, BufferState, BufferStats, RecordBufferOptions } from './buffer.js';
export { BackgroundFlusher, FLUSHER_CALLER } from './flusher.js';
export type { BackgroundFlusherOptions } from './flusher.js';
export { BatchWriter } from './writer.js';
export { ConnectionProvider, CONNECTION_PRAGMAS } from './connections.js';
export type { ConnectionFactory, ConnectionProviderOptions } from './connections.js';
export { SchemaManager, RESERVED_COLUMNS, RESERVED_COLUMN_NAMES } from './schema.js';
export type { ReservedColumn } from './schema.js';
export { createLogRecord, toExceptionInfo, toRow } from './record.js';
export type { ExceptionInfo, FieldValue, LogEvent, LogRecord, RecordOptions, SourceLocation } from './record.js';
export { toCanonicalJson, toJsonValue } from './serialize.js';
export type { FallbackReporter, JsonObject, JsonPrimitive, JsonValue } from './serialize.js';
export { currentCaller, currentCallerName, runAsCaller } from './caller-scope.js';
export type { CallerIdentity } from './caller-scope.js';
export { DEFAULT_FIELD_TYPE, handlerConfigSchema, resolveConfig } from './config.js';
export type { AdditionalField, LogHandlerConfig, ResolvedHandlerConfig } from './config.js';
export {
  ClosedHandlerError,
  ConfigError,
  ConnectionError,
  FlushError,
  HandlerNotReadyError,
  LogSinkError,
  RecordError,
  SchemaError,
  SerializationError,
} from './errors.js';
export type { LogSinkErrorCode } from './errors.js';

/**
 * Create and initialize a handler.
 *
 * @param config - Handler configuration
 * @param deps - Optional collaborators (logger, connection factory)
 * @returns Handler ready for `emit()`
 */
export async function createHandler(
  config: LogHandlerConfig,
  deps?: LogHandlerDeps,
): Promise<SQLiteLogHandler> {
  const handler = new SQLiteLogHandler(config, deps);
  await handler.initialize();
  return handler;
}

// Default export for convenience
export default createHandler;
