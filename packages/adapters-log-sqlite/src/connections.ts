/**
 * @module @logsink/adapters-log-sqlite/connections
 * One SQLite connection per caller, opened lazily and tuned on open.
 */

import { createAdapter, MEMORY_DATABASE, type SQLiteConfig } from '@logsink/adapters-sqlite';
import type { ISQLDatabase } from '@logsink/core';
import { currentCallerName } from './caller-scope.js';
import { ClosedHandlerError, ConnectionError } from './errors.js';

export type ConnectionFactory = (config: SQLiteConfig) => ISQLDatabase;

/**
 * Pragmas applied when a connection opens: WAL journal, NORMAL sync,
 * ~10 MB page cache, 256 MB memory-mapped window.
 */
export const CONNECTION_PRAGMAS = {
  wal: true,
  synchronous: 'NORMAL',
  cacheSize: -10000,
  mmapSize: 256 * 1024 * 1024,
} as const satisfies Partial<SQLiteConfig>;

export interface ConnectionProviderOptions {
  path: string;
  /** Milliseconds SQLite waits on a locked database (default: 5000) */
  busyTimeout?: number;
  /** Opens a connection (default: @logsink/adapters-sqlite) */
  connect?: ConnectionFactory;
}

/** Key used for the single connection shared by all callers of ':memory:' */
const SHARED_CONNECTION = '*';

/**
 * Keyed map from caller name to its connection.
 *
 * `:memory:` databases are private to one connection, so for them every
 * caller shares a single connection.
 */
export class ConnectionProvider {
  private readonly connections = new Map<string, ISQLDatabase>();
  private readonly path: string;
  private readonly busyTimeout: number;
  private readonly connect: ConnectionFactory;
  private closed = false;

  constructor(options: ConnectionProviderOptions) {
    this.path = options.path;
    this.busyTimeout = options.busyTimeout ?? 5000;
    this.connect = options.connect ?? createAdapter;
  }

  /** Number of open connections */
  get size(): number {
    return this.connections.size;
  }

  /**
   * Connection of the current caller, opened on first use.
   *
   * @throws ClosedHandlerError after `closeAll({ final: true })`
   * @throws ConnectionError when opening or tuning fails
   */
  connectionForCurrentCaller(): ISQLDatabase {
    if (this.closed) {
      throw new ClosedHandlerError('open a connection');
    }

    const caller = currentCallerName();
    const key = this.path === MEMORY_DATABASE ? SHARED_CONNECTION : caller;
    const existing = this.connections.get(key);
    if (existing?.isOpen()) {
      return existing;
    }

    let connection: ISQLDatabase;
    try {
      connection = this.connect({
        filename: this.path,
        busyTimeout: this.busyTimeout,
        ...CONNECTION_PRAGMAS,
      });
    } catch (error) {
      throw new ConnectionError(caller, { cause: error });
    }

    this.connections.set(key, connection);
    return connection;
  }

  /**
   * Close the current caller's connection, if it has one. The next use
   * opens a fresh one. The shared `:memory:` connection is never released,
   * since closing it would discard the database.
   *
   * @returns whether a connection was closed
   */
  async release(): Promise<boolean> {
    if (this.path === MEMORY_DATABASE) {
      return false;
    }

    const caller = currentCallerName();
    const connection = this.connections.get(caller);
    if (!connection) {
      return false;
    }

    this.connections.delete(caller);
    await connection.close();
    return true;
  }

  /**
   * Close every connection. Later calls reopen transparently unless
   * `final` is set, which makes the provider refuse new connections.
   */
  async closeAll(options: { final?: boolean } = {}): Promise<void> {
    if (options.final) {
      this.closed = true;
    }

    const open = [...this.connections.values()];
    this.connections.clear();

    const results = await Promise.allSettled(open.map((connection) => connection.close()));
    const failures = results.filter((result): result is PromiseRejectedResult => result.status === 'rejected');
    if (failures.length > 0) {
      throw new AggregateError(
        failures.map((failure) => failure.reason),
        `Failed to close ${failures.length} SQLite connection(s)`,
      );
    }
  }
}
