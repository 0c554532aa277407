/**
 * @module @logsink/adapters-log-sqlite/schema
 * Table layout and the idempotent schema setup.
 */

import type { ISQLDatabase } from '@logsink/core';
import type { AdditionalField } from './config.js';
import { SchemaError } from './errors.js';

/**
 * Reserved columns in table order, after the `id` primary key.
 */
export const RESERVED_COLUMNS = [
  ['created_at', 'TEXT NOT NULL'],
  ['level', 'INTEGER NOT NULL'],
  ['level_name', 'TEXT NOT NULL'],
  ['logger_name', 'TEXT NOT NULL'],
  ['message', 'TEXT NOT NULL'],
  ['filename', 'TEXT'],
  ['function_name', 'TEXT'],
  ['line_number', 'INTEGER'],
  ['thread_id', 'INTEGER'],
  ['thread_name', 'TEXT'],
  ['process_id', 'INTEGER'],
  ['process_name', 'TEXT'],
  ['exception_info', 'TEXT'],
  ['extra', 'TEXT'],
] as const;

export type ReservedColumn = (typeof RESERVED_COLUMNS)[number][0];

const PRIMARY_KEY = 'id';

/** Lower-cased names no additional field or extra key may take */
export const RESERVED_COLUMN_NAMES: ReadonlySet<string> = new Set([
  PRIMARY_KEY,
  ...RESERVED_COLUMNS.map(([name]) => name),
]);

/** Columns indexed for selective queries */
const INDEXED_COLUMNS: readonly ReservedColumn[] = ['level', 'created_at', 'logger_name'];

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
/** Type name, optional `(n)` or `(p, s)` size, optional constraint words; no bare commas */
const COLUMN_TYPE = /^[A-Za-z][A-Za-z0-9_ ]*(\(\s*\d+\s*(,\s*\d+\s*)?\))?[A-Za-z0-9_ ]*$/;

export function quoteIdentifier(name: string): string {
  return `"${name}"`;
}

/**
 * Owns the table layout: reserved columns, caller-declared additional
 * fields, and the indexes on level, created_at and logger_name.
 */
export class SchemaManager {
  readonly tableName: string;
  readonly additionalFields: readonly AdditionalField[];
  /** Column order of every insert: reserved columns, then additional fields */
  readonly insertColumns: readonly string[];

  /**
   * @throws SchemaError when a name is not an identifier, a type is malformed,
   *   or an additional field collides with a reserved or earlier field
   */
  constructor(tableName: string, additionalFields: readonly AdditionalField[]) {
    if (!IDENTIFIER.test(tableName)) {
      throw new SchemaError(`Invalid table name "${tableName}"`);
    }

    const seen = new Set<string>();
    for (const field of additionalFields) {
      const key = field.name.toLowerCase();
      if (!IDENTIFIER.test(field.name)) {
        throw new SchemaError(`Invalid additional field name "${field.name}"`);
      }
      if (!COLUMN_TYPE.test(field.type)) {
        throw new SchemaError(`Invalid type "${field.type}" for additional field "${field.name}"`);
      }
      if (RESERVED_COLUMN_NAMES.has(key)) {
        throw new SchemaError(`Additional field "${field.name}" collides with a reserved column`);
      }
      if (seen.has(key)) {
        throw new SchemaError(`Additional field "${field.name}" is declared more than once`);
      }
      seen.add(key);
    }

    this.tableName = tableName;
    this.additionalFields = additionalFields;
    this.insertColumns = [
      ...RESERVED_COLUMNS.map(([name]) => name),
      ...additionalFields.map((field) => field.name),
    ];
  }

  createTableSQL(): string {
    const columns = [
      `${quoteIdentifier(PRIMARY_KEY)} INTEGER PRIMARY KEY AUTOINCREMENT`,
      ...RESERVED_COLUMNS.map(([name, type]) => `${quoteIdentifier(name)} ${type}`),
      ...this.additionalFields.map((field) => `${quoteIdentifier(field.name)} ${field.type}`),
    ];
    return `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(this.tableName)} (\n  ${columns.join(',\n  ')}\n)`;
  }

  createIndexesSQL(): string[] {
    return INDEXED_COLUMNS.map(
      (column) =>
        `CREATE INDEX IF NOT EXISTS ${quoteIdentifier(`idx_${this.tableName}_${column}`)} ` +
        `ON ${quoteIdentifier(this.tableName)} (${quoteIdentifier(column)})`,
    );
  }

  insertSQL(): string {
    const columns = this.insertColumns.map(quoteIdentifier).join(', ');
    const placeholders = this.insertColumns.map(() => '?').join(', ');
    return `INSERT INTO ${quoteIdentifier(this.tableName)} (${columns}) VALUES (${placeholders})`;
  }

  /**
   * Create the table and indexes if absent, then check that an existing
   * table has every expected column. Safe to call repeatedly and from
   * several connections.
   *
   * @throws SchemaError on DDL failure or a table missing columns
   */
  async ensureSchema(db: ISQLDatabase): Promise<void> {
    try {
      await db.exec([this.createTableSQL(), ...this.createIndexesSQL()].join(';\n'));
    } catch (error) {
      throw new SchemaError(`Failed to create table "${this.tableName}"`, { cause: error });
    }

    let existing: Set<string>;
    try {
      const info = await db.query<{ name: string }>(`PRAGMA table_info(${quoteIdentifier(this.tableName)})`);
      existing = new Set(info.rows.map((row) => row.name.toLowerCase()));
    } catch (error) {
      throw new SchemaError(`Failed to inspect table "${this.tableName}"`, { cause: error });
    }

    const missing = [PRIMARY_KEY, ...this.insertColumns].filter(
      (column) => !existing.has(column.toLowerCase()),
    );
    if (missing.length > 0) {
      throw new SchemaError(
        `Table "${this.tableName}" exists without expected columns: ${missing.join(', ')}`,
      );
    }
  }
}
