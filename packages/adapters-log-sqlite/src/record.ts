/**
 * @module @logsink/adapters-log-sqlite/record
 * Log record model and its mapping to table rows.
 */

import { format } from 'node:util';
import { isLogLevel, levelName, levelValue, type LogLevel, type SQLValue } from '@logsink/core';
import { currentCaller } from './caller-scope.js';
import type { AdditionalField } from './config.js';
import { RecordError } from './errors.js';
import { RESERVED_COLUMNS, RESERVED_COLUMN_NAMES, type ReservedColumn } from './schema.js';
import { toJsonValue, type FallbackReporter, type JsonObject } from './serialize.js';

export interface SourceLocation {
  filename?: string;
  functionName?: string;
  lineNumber?: number;
}

/**
 * A log event as handed over by the logging framework.
 */
export interface LogEvent {
  level: LogLevel | number;
  /** Message, or printf-style template when `args` is given */
  message: string;
  args?: unknown[];
  /** Default: 'root' */
  loggerName?: string;
  /** Epoch milliseconds or Date (default: now) */
  timestamp?: number | Date;
  source?: SourceLocation;
  /** Attached error, usually an Error instance */
  error?: unknown;
  /** Caller data; keys matching an additional field fill that column */
  extra?: Record<string, unknown>;
  /** Overrides the current caller identity */
  thread?: { id: number; name: string };
  /** Overrides the current process identity */
  process?: { id: number; name: string };
}

export interface ExceptionInfo {
  readonly type: string;
  readonly message: string;
  readonly stack: string;
}

/** Value stored in an additional field column */
export type FieldValue = string | number | null;

/**
 * Immutable log record. Created by `createLogRecord()`, frozen.
 */
export interface LogRecord {
  readonly level: number;
  readonly levelName: string;
  readonly loggerName: string;
  readonly message: string;
  /** ISO-8601 UTC with milliseconds */
  readonly createdAt: string;
  readonly filename: string | null;
  readonly functionName: string | null;
  readonly lineNumber: number | null;
  readonly threadId: number;
  readonly threadName: string;
  readonly processId: number;
  readonly processName: string;
  readonly exceptionInfo: ExceptionInfo | null;
  readonly extra: Readonly<JsonObject> | null;
  readonly additionalFieldValues: Readonly<Record<string, FieldValue>>;
}

export interface RecordOptions {
  additionalFields?: readonly AdditionalField[];
  onSerializationFallback?: FallbackReporter;
}

/**
 * Build a frozen record from `event`.
 *
 * `extra` is snapshotted to JSON data, so later changes by the caller do not
 * reach the record. Keys naming an additional field move to
 * `additionalFieldValues`; keys naming a reserved column are dropped.
 *
 * @throws RecordError when the level is neither a known label nor an integer
 */
export function createLogRecord(event: LogEvent, options: RecordOptions = {}): LogRecord {
  const level = resolveLevel(event.level);
  const report = options.onSerializationFallback;
  const fields = options.additionalFields ?? [];
  const fieldNames = new Map(fields.map((field) => [field.name.toLowerCase(), field.name]));

  const extraInput: Array<[string, unknown]> = [];
  const fieldInput = new Map<string, unknown>();
  for (const [key, value] of Object.entries(event.extra ?? {})) {
    const lower = key.toLowerCase();
    const fieldName = fieldNames.get(lower);
    if (fieldName !== undefined) {
      fieldInput.set(fieldName, value);
    } else if (!RESERVED_COLUMN_NAMES.has(lower)) {
      extraInput.push([key, value]);
    }
  }

  const extra = snapshotObject(extraInput, report);
  const additionalFieldValues: Record<string, FieldValue> = {};
  for (const field of fields) {
    additionalFieldValues[field.name] = toFieldValue(fieldInput.get(field.name), report, field.name);
  }

  const identity = currentCaller();
  const caller = event.thread ?? { id: identity.threadId, name: identity.threadName };

  return deepFreeze({
    level,
    levelName: levelName(level),
    loggerName: event.loggerName ?? 'root',
    message: event.args && event.args.length > 0 ? format(event.message, ...event.args) : event.message,
    createdAt: toTimestamp(event.timestamp),
    filename: event.source?.filename ?? null,
    functionName: event.source?.functionName ?? null,
    lineNumber: event.source?.lineNumber ?? null,
    threadId: caller.id,
    threadName: caller.name,
    processId: event.process?.id ?? process.pid,
    processName: event.process?.name ?? process.title,
    exceptionInfo: event.error === undefined || event.error === null ? null : toExceptionInfo(event.error),
    extra: Object.keys(extra).length > 0 ? extra : null,
    additionalFieldValues,
  });
}

/**
 * Exception payload for any thrown value.
 */
export function toExceptionInfo(error: unknown): ExceptionInfo {
  if (error instanceof Error) {
    return {
      type: error.name,
      message: error.message,
      stack: error.stack ?? `${error.name}: ${error.message}`,
    };
  }

  // Already-serialized errors, such as pino's { type, message, stack }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    const type =
      'type' in error && typeof error.type === 'string'
        ? error.type
        : 'name' in error && typeof error.name === 'string'
          ? error.name
          : 'Error';
    const stack = 'stack' in error && typeof error.stack === 'string' ? error.stack : `${type}: ${error.message}`;
    return { type, message: error.message, stack };
  }

  return { type: typeof error, message: String(error), stack: '' };
}

/**
 * Row values in `columns` order, as bound to the insert statement.
 */
export function toRow(record: LogRecord, columns: readonly string[]): SQLValue[] {
  return columns.map((column) =>
    isReservedColumn(column) ? reservedValue(record, column) : (record.additionalFieldValues[column] ?? null),
  );
}

function reservedValue(record: LogRecord, column: ReservedColumn): SQLValue {
  switch (column) {
    case 'created_at':
      return record.createdAt;
    case 'level':
      return record.level;
    case 'level_name':
      return record.levelName;
    case 'logger_name':
      return record.loggerName;
    case 'message':
      return record.message;
    case 'filename':
      return record.filename;
    case 'function_name':
      return record.functionName;
    case 'line_number':
      return record.lineNumber;
    case 'thread_id':
      return record.threadId;
    case 'thread_name':
      return record.threadName;
    case 'process_id':
      return record.processId;
    case 'process_name':
      return record.processName;
    case 'exception_info':
      return record.exceptionInfo
        ? JSON.stringify({
            message: record.exceptionInfo.message,
            stack: record.exceptionInfo.stack,
            type: record.exceptionInfo.type,
          })
        : null;
    case 'extra':
      return record.extra ? JSON.stringify(record.extra) : null;
  }
}

function isReservedColumn(column: string): column is ReservedColumn {
  return RESERVED_COLUMNS.some(([name]) => name === column);
}

function snapshotObject(entries: Array<[string, unknown]>, report: FallbackReporter | undefined): JsonObject {
  const snapshot: JsonObject = {};
  for (const [key, value] of entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    const json = toJsonValue(value, report, `extra.${key}`);
    if (json !== undefined) {
      snapshot[key] = json;
    }
  }
  return snapshot;
}

function toFieldValue(value: unknown, report: FallbackReporter | undefined, name: string): FieldValue {
  if (typeof value === 'bigint') {
    return value.toString();
  }

  const json = toJsonValue(value, report, name);
  if (json === undefined || json === null) {
    return null;
  }
  if (typeof json === 'boolean') {
    return json ? 1 : 0;
  }
  if (typeof json === 'string' || typeof json === 'number') {
    return json;
  }
  return JSON.stringify(json);
}

function resolveLevel(level: LogLevel | number): number {
  // Callers without type checks can pass anything here
  const value: unknown = level;
  if ((typeof value === 'number' && Number.isInteger(value)) || isLogLevel(value)) {
    return levelValue(value);
  }
  throw new RecordError(`Invalid log level: ${String(value)}`);
}

function toTimestamp(timestamp: number | Date | undefined): string {
  const date = timestamp instanceof Date ? new Date(timestamp.getTime()) : new Date(timestamp ?? Date.now());
  // Out-of-range and NaN times fall back to now
  return (Number.isNaN(date.getTime()) ? new Date() : date).toISOString();
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
  }
  return value;
}
