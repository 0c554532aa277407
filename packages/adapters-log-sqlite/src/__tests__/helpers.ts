import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createAdapter } from '@logsink/adapters-sqlite';
import type { ILogger } from '@logsink/core';

export interface LoggedEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  error?: Error;
  meta?: Record<string, unknown>;
  bindings: Record<string, unknown>;
}

/**
 * ILogger that keeps every call, children included, in one list.
 */
export class RecordingLogger implements ILogger {
  constructor(
    readonly entries: LoggedEntry[] = [],
    private readonly bindings: Record<string, unknown> = {},
  ) {}

  debug(message: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level: 'debug', message, meta, bindings: this.bindings });
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level: 'info', message, meta, bindings: this.bindings });
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.entries.push({ level: 'warn', message, meta, bindings: this.bindings });
  }

  error(message: string, error?: Error, meta?: Record<string, unknown>): void {
    this.entries.push({ level: 'error', message, error, meta, bindings: this.bindings });
  }

  child(bindings: Record<string, unknown>): ILogger {
    return new RecordingLogger(this.entries, { ...this.bindings, ...bindings });
  }
}

export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'logsink-test-log-sqlite-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Run `sql` on a separate connection to `path`.
 */
export async function queryRows<T>(path: string, sql: string): Promise<T[]> {
  const db = createAdapter({ filename: path });
  try {
    const result = await db.query<T>(sql);
    return result.rows;
  } finally {
    await db.close();
  }
}

export async function countRows(path: string, table = 'logs'): Promise<number> {
  const rows = await queryRows<{ count: number }>(path, `SELECT COUNT(*) AS count FROM "${table}"`);
  return rows[0]?.count ?? 0;
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
