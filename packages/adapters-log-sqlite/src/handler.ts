/**
 * @module @logsink/adapters-log-sqlite/handler
 * Buffered SQLite log handler.
 */

import { createAdapter as createPinoLogger } from '@logsink/adapters-pino';
import type { ILogger } from '@logsink/core';
import { RecordBuffer, type BufferStats } from './buffer.js';
import { resolveConfig, type LogHandlerConfig, type ResolvedHandlerConfig } from './config.js';
import { ConnectionProvider, type ConnectionFactory } from './connections.js';
import { ClosedHandlerError, HandlerNotReadyError, type SerializationError } from './errors.js';
import { BackgroundFlusher } from './flusher.js';
import { createLogRecord, type LogEvent } from './record.js';
import { SchemaManager } from './schema.js';
import { BatchWriter } from './writer.js';

export type HandlerState = 'constructing' | 'active' | 'closed';

/**
 * Collaborators of the handler. All optional.
 */
export interface LogHandlerDeps {
  /** Diagnostics logger (default: pino at level 'warn') */
  logger?: ILogger;
  /** Called for every value replaced by its string form */
  onSerializationFallback?: (error: SerializationError) => void;
  /** Opens SQLite connections (default: @logsink/adapters-sqlite) */
  connect?: ConnectionFactory;
}

export interface HandlerStats extends BufferStats {
  state: HandlerState;
  /** Open connections */
  connections: number;
}

/**
 * Accumulates log records in memory and writes them to SQLite in batches.
 *
 * Design:
 * - A batch is written when `capacity` records are pending, every
 *   `flushInterval` seconds, on `flush()` and once more on `close()`
 * - One connection per caller (see `runAsCaller`), WAL with NORMAL sync
 * - At-most-once: a failed batch is reported and dropped, never retried
 */
export class SQLiteLogHandler {
  readonly config: ResolvedHandlerConfig;
  private readonly schema: SchemaManager;
  private readonly connections: ConnectionProvider;
  private readonly buffer: RecordBuffer;
  private readonly flusher: BackgroundFlusher;
  private readonly logger: ILogger;
  private readonly onSerializationFallback: (error: SerializationError) => void;
  private lifecycle: HandlerState = 'constructing';
  private initializing: Promise<void> | null = null;
  private closing: Promise<void> | null = null;

  /**
   * @throws ConfigError on invalid options
   * @throws SchemaError on invalid or colliding names
   */
  constructor(config: LogHandlerConfig, deps: LogHandlerDeps = {}) {
    this.config = resolveConfig(config);
    this.schema = new SchemaManager(this.config.tableName, this.config.additionalFields);
    this.logger = (deps.logger ?? createPinoLogger({ level: 'warn' })).child({
      component: 'log-sqlite',
      table: this.config.tableName,
    });
    this.onSerializationFallback = (error) => {
      this.logger.warn(error.message, { path: error.path });
      deps.onSerializationFallback?.(error);
    };

    this.connections = new ConnectionProvider({
      path: this.config.path,
      busyTimeout: this.config.busyTimeout,
      connect: deps.connect,
    });
    const writer = new BatchWriter(this.schema, this.connections);
    this.buffer = new RecordBuffer({
      capacity: this.config.capacity,
      sink: (batch) => writer.flush(batch),
    });
    this.flusher = new BackgroundFlusher({
      intervalSeconds: this.config.flushInterval,
      flush: () => this.buffer.drainAndFlush(),
      logger: this.logger,
      describe: () => ({ droppedRecords: this.buffer.stats().droppedRecords }),
    });
  }

  get state(): HandlerState {
    return this.lifecycle;
  }

  /**
   * Create the table and indexes, then start the flush timer.
   * Must be called before `emit()`. Idempotent.
   *
   * @throws SchemaError when the table cannot be created or is incompatible
   * @throws ConnectionError when the database cannot be opened
   */
  async initialize(): Promise<void> {
    if (this.lifecycle === 'closed') {
      throw new ClosedHandlerError('initialize');
    }
    if (this.lifecycle === 'active') {
      return;
    }

    this.initializing ??= this.setup();
    await this.initializing;
  }

  /**
   * Queue one log event. Resolves at once unless the event fills the
   * buffer, in which case it resolves when the batch is written.
   *
   * @throws HandlerNotReadyError before `initialize()`
   * @throws ClosedHandlerError after `close()`
   * @throws RecordError when the event has an invalid level; nothing is queued
   * @throws FlushError when the size-triggered write fails
   */
  async emit(event: LogEvent): Promise<void> {
    this.assertActive('emit a record');
    const record = createLogRecord(event, {
      additionalFields: this.config.additionalFields,
      onSerializationFallback: this.onSerializationFallback,
    });
    await this.buffer.enqueue(record);
  }

  /**
   * Write everything pending now.
   *
   * @throws FlushError when the write fails
   */
  async flush(): Promise<void> {
    this.assertActive('flush');
    await this.buffer.drainAndFlush();
  }

  /**
   * Stop the timer, write pending records once, release every connection.
   * Calling it again returns the first call's result.
   *
   * @throws FlushError when the final write fails (connections are still released)
   */
  async close(): Promise<void> {
    this.closing ??= this.shutdown();
    await this.closing;
  }

  /**
   * Close the connection of the current caller. Callers named per request
   * or per job (see `runAsCaller`) should call this when done, after their
   * last flush, or their connections stay open until `close()`.
   */
  async releaseConnection(): Promise<void> {
    await this.connections.release();
  }

  stats(): HandlerStats {
    return {
      state: this.lifecycle,
      ...this.buffer.stats(),
      connections: this.connections.size,
    };
  }

  private async setup(): Promise<void> {
    try {
      await this.schema.ensureSchema(this.connections.connectionForCurrentCaller());
    } catch (error) {
      this.initializing = null;
      throw error;
    }

    if (this.lifecycle === 'closed') {
      return;
    }
    this.lifecycle = 'active';
    this.flusher.start();
    this.logger.debug('Log handler initialized', {
      path: this.config.path,
      capacity: this.config.capacity,
      flushInterval: this.config.flushInterval,
    });
  }

  private async shutdown(): Promise<void> {
    this.lifecycle = 'closed';
    this.flusher.stop();

    try {
      if (this.initializing) {
        await Promise.allSettled([this.initializing]);
      }
      await this.flusher.idle();
      await this.buffer.close();
    } finally {
      await this.connections.closeAll({ final: true });
      this.logger.debug('Log handler closed', { ...this.buffer.stats() });
    }
  }

  private assertActive(operation: string): void {
    if (this.lifecycle === 'constructing') {
      throw new HandlerNotReadyError(operation);
    }
    if (this.lifecycle === 'closed') {
      throw new ClosedHandlerError(operation);
    }
  }
}
