/**
 * @module @logsink/core/database
 * SQL database contract implemented by @logsink/adapters-sqlite.
 */

/**
 * Value that can be bound to a statement parameter.
 */
export type SQLValue = string | number | bigint | Buffer | null;

/**
 * Result of a single statement.
 */
export interface SQLQueryResult<T = unknown> {
  rows: T[];
  /** Rows returned for reads, rows changed for writes */
  rowCount: number;
  fields: Array<{ name: string; type: string }>;
}

/**
 * Embedded SQL database connection.
 */
export interface ISQLDatabase {
  /**
   * Execute one statement with `?` placeholders.
   */
  query<T = unknown>(sql: string, params?: SQLValue[]): Promise<SQLQueryResult<T>>;

  /**
   * Execute one or more statements without parameters (DDL).
   */
  exec(sql: string): Promise<void>;

  /**
   * Run `sql` once per parameter tuple inside a single transaction.
   * Either every row is written or none is.
   *
   * @returns number of changed rows
   */
  batch(sql: string, rows: SQLValue[][]): Promise<number>;

  close(): Promise<void>;

  isOpen(): boolean;
}
