/**
 * @module @logsink/adapters-sqlite
 * SQLite adapter implementing ISQLDatabase interface.
 *
 * Features:
 * - Based on better-sqlite3 (synchronous API)
 * - Pragma tuning on open (WAL, synchronous mode, page cache, mmap)
 * - All-or-nothing batch writes in one transaction
 * - Type-safe query results
 *
 * @example
 * ```typescript
 * import { createAdapter } from '@logsink/adapters-sqlite';
 *
 * const db = createAdapter({
 *   filename: '/var/data/app.db',
 *   synchronous: 'NORMAL',
 *   cacheSize: -10000,
 * });
 *
 * await db.exec('CREATE TABLE IF NOT EXISTS users (id INTEGER PRIMARY KEY, name TEXT)');
 * await db.batch('INSERT INTO users (name) VALUES (?)', [['Alice'], ['Bob']]);
 *
 * const result = await db.query<{ name: string }>('SELECT name FROM users');
 * console.log(result.rows); // [{ name: 'Alice' }, { name: 'Bob' }]
 *
 * await db.close();
 * ```
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { ISQLDatabase, SQLQueryResult, SQLValue } from '@logsink/core';

export const MEMORY_DATABASE = ':memory:';

/**
 * SQLite `synchronous` pragma values.
 */
export type SynchronousMode = 'OFF' | 'NORMAL' | 'FULL' | 'EXTRA';

/**
 * Configuration for SQLite database adapter.
 */
export interface SQLiteConfig {
  /**
   * Database file path.
   * Use ':memory:' for in-memory database (useful for testing).
   */
  filename: string;

  /**
   * Open in readonly mode (default: false)
   */
  readonly?: boolean;

  /**
   * Enable WAL mode for better concurrency (default: true)
   * https://www.sqlite.org/wal.html
   */
  wal?: boolean;

  /**
   * Durability level (default: SQLite's own, FULL)
   */
  synchronous?: SynchronousMode;

  /**
   * Page cache size. Positive values count pages, negative values KiB
   * (default: SQLite's own)
   */
  cacheSize?: number;

  /**
   * Memory-mapped I/O window in bytes, 0 disables (default: SQLite's own)
   */
  mmapSize?: number;

  /**
   * Busy timeout in milliseconds (default: 5000)
   */
  busyTimeout?: number;
}

/**
 * SQLite implementation of ISQLDatabase interface.
 *
 * Design:
 * - Uses better-sqlite3 (synchronous, but wrapped in async for interface compatibility)
 * - One connection per adapter instance
 * - A batch runs inside one better-sqlite3 transaction and never yields
 *   between BEGIN and COMMIT
 */
export class SQLiteAdapter implements ISQLDatabase {
  private db: Database.Database;
  private closed = false;

  constructor(config: SQLiteConfig) {
    // Create parent directory if it doesn't exist (unless :memory:)
    if (config.filename !== MEMORY_DATABASE && !config.readonly) {
      mkdirSync(dirname(config.filename), { recursive: true });
    }

    this.db = new Database(config.filename, {
      readonly: config.readonly ?? false,
      fileMustExist: false, // Create if not exists
    });

    try {
      this.applyPragmas(config);
    } catch (error) {
      this.db.close();
      this.closed = true;
      throw error;
    }
  }

  private applyPragmas(config: SQLiteConfig): void {
    this.db.pragma(`busy_timeout = ${config.busyTimeout ?? 5000}`);

    if (config.wal !== false && !config.readonly) {
      this.db.pragma('journal_mode = WAL');
    }
    if (config.synchronous !== undefined) {
      this.db.pragma(`synchronous = ${config.synchronous}`);
    }
    if (config.cacheSize !== undefined) {
      this.db.pragma(`cache_size = ${Math.trunc(config.cacheSize)}`);
    }
    if (config.mmapSize !== undefined) {
      this.db.pragma(`mmap_size = ${Math.trunc(config.mmapSize)}`);
    }
  }

  /**
   * Execute a SQL query.
   *
   * @param sql - SQL query string (supports ? placeholders)
   * @param params - Query parameters
   * @returns Query result with rows and metadata
   */
  async query<T = unknown>(sql: string, params?: SQLValue[]): Promise<SQLQueryResult<T>> {
    this.checkClosed();

    try {
      const stmt = this.db.prepare(sql);

      // SELECT, PRAGMA and RETURNING statements
      if (stmt.reader) {
        const rows = params ? stmt.all(...params) : stmt.all();

        return {
          rows: rows as T[],
          rowCount: rows.length,
          fields: this.getFieldMetadata(stmt),
        };
      }

      // INSERT/UPDATE/DELETE/DDL statements
      const info = params ? stmt.run(...params) : stmt.run();

      return {
        rows: [],
        rowCount: info.changes,
        fields: [],
      };
    } catch (error) {
      throw new Error(
        `SQLite query failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * Execute raw SQL (useful for schema setup).
   * Does not return rows - use query() for SELECT.
   */
  async exec(sql: string): Promise<void> {
    this.checkClosed();

    try {
      this.db.exec(sql);
    } catch (error) {
      throw new Error(
        `SQLite exec failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * Run one statement per parameter tuple in a single transaction.
   * A failing row rolls back every row of the batch.
   */
  async batch(sql: string, rows: SQLValue[][]): Promise<number> {
    this.checkClosed();

    try {
      const stmt = this.db.prepare(sql);
      const runAll = this.db.transaction((tuples: SQLValue[][]) => {
        let changes = 0;
        for (const params of tuples) {
          changes += stmt.run(...params).changes;
        }
        return changes;
      });
      return runAll(rows);
    } catch (error) {
      throw new Error(
        `SQLite batch failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error },
      );
    }
  }

  /**
   * Close the database connection.
   */
  async close(): Promise<void> {
    if (!this.closed) {
      this.db.close();
      this.closed = true;
    }
  }

  /**
   * Check if database is open.
   */
  isOpen(): boolean {
    return !this.closed;
  }

  /**
   * Check if database is closed.
   */
  private checkClosed(): void {
    if (this.closed) {
      throw new Error('Database connection is closed');
    }
  }

  /**
   * Extract field metadata from prepared statement.
   */
  private getFieldMetadata(stmt: Database.Statement): Array<{ name: string; type: string }> {
    return stmt.columns().map((col) => ({
      name: col.name,
      type: col.type ?? 'unknown',
    }));
  }
}

/**
 * Create SQLite database adapter.
 *
 * @example
 * ```typescript
 * const db = createAdapter({
 *   filename: '/var/data/app.db',
 *   wal: true,
 * });
 * ```
 */
export function createAdapter(config: SQLiteConfig): SQLiteAdapter {
  return new SQLiteAdapter(config);
}

// Default export for direct import
export default createAdapter;
