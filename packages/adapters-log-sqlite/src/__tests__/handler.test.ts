import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createAdapter } from '@logsink/adapters-sqlite';
import { runAsCaller } from '../caller-scope.js';
import {
  ClosedHandlerError,
  FlushError,
  HandlerNotReadyError,
  RecordError,
  SchemaError,
  type SerializationError,
} from '../errors.js';
import { SQLiteLogHandler } from '../handler.js';
import { createHandler } from '../index.js';
import { countRows, createTempDir, queryRows, RecordingLogger, removeTempDir } from './helpers.js';

describe('SQLiteLogHandler', () => {
  let tmpDir: string;
  let dbPath: string;
  let logger: RecordingLogger;
  const handlers: SQLiteLogHandler[] = [];

  async function open(config: Partial<Parameters<typeof createHandler>[0]> = {}): Promise<SQLiteLogHandler> {
    const handler = await createHandler({ path: dbPath, flushInterval: 0, ...config }, { logger });
    handlers.push(handler);
    return handler;
  }

  beforeEach(async () => {
    tmpDir = await createTempDir();
    dbPath = join(tmpDir, 'logs.db');
    logger = new RecordingLogger();
  });

  afterEach(async () => {
    await Promise.allSettled(handlers.splice(0).map((handler) => handler.close()));
    await removeTempDir(tmpDir);
  });

  describe('lifecycle', () => {
    it('refuses records before initialize', async () => {
      const handler = new SQLiteLogHandler({ path: dbPath }, { logger });

      expect(handler.state).toBe('constructing');
      await expect(handler.emit({ level: 'info', message: 'early' })).rejects.toThrow(HandlerNotReadyError);
      await expect(handler.flush()).rejects.toThrow(HandlerNotReadyError);
      await handler.close();
    });

    it('moves from active to closed and refuses records afterwards', async () => {
      const handler = await open();
      expect(handler.state).toBe('active');

      await handler.close();
      await handler.close();

      expect(handler.state).toBe('closed');
      expect(handler.stats().connections).toBe(0);
      await expect(handler.emit({ level: 'info', message: 'late' })).rejects.toThrow(ClosedHandlerError);
      await expect(handler.flush()).rejects.toThrow(ClosedHandlerError);
      await expect(handler.initialize()).rejects.toThrow(ClosedHandlerError);
    });

    it('initializes once', async () => {
      const handler = await open();
      await handler.initialize();
      expect(handler.state).toBe('active');
    });

    it('logs lifecycle events through a child logger', async () => {
      const handler = await open({ tableName: 'app_logs' });
      await handler.close();

      expect(logger.entries.map((entry) => [entry.level, entry.message])).toEqual([
        ['debug', 'Log handler initialized'],
        ['debug', 'Log handler closed'],
      ]);
      expect(logger.entries[0]?.bindings).toEqual({ component: 'log-sqlite', table: 'app_logs' });
    });

    it('fails to initialize against an incompatible table', async () => {
      const db = createAdapter({ filename: dbPath });
      await db.exec('CREATE TABLE logs (id INTEGER PRIMARY KEY, body TEXT)');
      await db.close();

      const handler = new SQLiteLogHandler({ path: dbPath }, { logger });
      handlers.push(handler);
      await expect(handler.initialize()).rejects.toThrow(SchemaError);
      expect(handler.state).toBe('constructing');
    });
  });

  describe('flushing', () => {
    it('keeps records below capacity in memory until close', async () => {
      const handler = await open({ capacity: 10 });

      for (let i = 0; i < 5; i++) {
        await handler.emit({ level: 'info', message: `record ${i}` });
      }

      expect(await countRows(dbPath)).toBe(0);
      expect(handler.stats().pending).toBe(5);

      await handler.close();
      expect(await countRows(dbPath)).toBe(5);
    });

    it('writes a full batch as soon as capacity is reached', async () => {
      const handler = await open({ capacity: 3 });

      for (const message of ['A', 'B', 'C', 'D']) {
        await handler.emit({ level: 'info', message });
      }

      const rows = await queryRows<{ message: string }>(dbPath, 'SELECT message FROM logs ORDER BY id');
      expect(rows.map((row) => row.message)).toEqual(['A', 'B', 'C']);
      expect(handler.stats()).toMatchObject({ pending: 1, flushes: 1, flushedRecords: 3 });
    });

    it('writes pending records on flush', async () => {
      const handler = await open();
      await handler.emit({ level: 'warn', message: 'now' });
      await handler.flush();
      await handler.flush();

      expect(await countRows(dbPath)).toBe(1);
      expect(handler.stats().flushes).toBe(1);
    });

    it('writes on the timer without reaching capacity', async () => {
      const handler = await open({ capacity: 1000, flushInterval: 0.05 });

      for (let i = 0; i < 3; i++) {
        await handler.emit({ level: 'info', message: `timed ${i}` });
      }

      await vi.waitFor(async () => expect(await countRows(dbPath)).toBe(3), { timeout: 2000 });
      await handler.close();
      expect(await countRows(dbPath)).toBe(3);
    });

    it('stores records from concurrent callers exactly once', async () => {
      const handler = await open({ capacity: 64 });
      const callers = 10;
      const perCaller = 50;

      await Promise.all(
        Array.from({ length: callers }, (_, c) =>
          runAsCaller(`caller-${c}`, async () => {
            for (let i = 0; i < perCaller; i++) {
              await handler.emit({ level: 'info', message: `caller ${c} record ${i}`, extra: { nonce: `${c}:${i}` } });
            }
          }),
        ),
      );
      await handler.close();

      const [totals] = await queryRows<{ total: number; nonces: number; threads: number }>(
        dbPath,
        "SELECT COUNT(*) AS total, COUNT(DISTINCT json_extract(extra, '$.nonce')) AS nonces, " +
          'COUNT(DISTINCT thread_name) AS threads FROM logs',
      );
      expect(totals).toEqual({ total: 500, nonces: 500, threads: 10 });
    });

    it('keeps per-caller order', async () => {
      const handler = await open({ capacity: 7 });

      await Promise.all(
        ['left', 'right'].map((name) =>
          runAsCaller(name, async () => {
            for (let i = 0; i < 20; i++) {
              await handler.emit({ level: 'info', message: String(i) });
            }
          }),
        ),
      );
      await handler.close();

      const rows = await queryRows<{ message: string }>(
        dbPath,
        "SELECT message FROM logs WHERE thread_name = 'left' ORDER BY id",
      );
      expect(rows.map((row) => Number(row.message))).toEqual(Array.from({ length: 20 }, (_, i) => i));
    });

    it('drops a batch the database rejects and reports it', async () => {
      const handler = await open();
      const db = createAdapter({ filename: dbPath });
      await db.exec('DROP TABLE logs');
      await db.close();

      await handler.emit({ level: 'info', message: 'one' });
      await handler.emit({ level: 'info', message: 'two' });
      await expect(handler.flush()).rejects.toThrow(FlushError);

      expect(handler.stats()).toMatchObject({ pending: 0, failedFlushes: 1, droppedRecords: 2 });
    });

    it('rejects an event with an invalid level without losing the batch around it', async () => {
      const handler = await open();

      await handler.emit({ level: 'info', message: 'before' });
      await expect(handler.emit({ level: Number.NaN, message: 'bad level' })).rejects.toThrow(RecordError);
      await handler.emit({ level: 'info', message: 'after', timestamp: 1e20 });
      await handler.flush();

      const rows = await queryRows<{ message: string }>(dbPath, 'SELECT message FROM logs ORDER BY id');
      expect(rows.map((row) => row.message)).toEqual(['before', 'after']);
      expect(handler.stats()).toMatchObject({ failedFlushes: 0, droppedRecords: 0 });
    });

    it('releases the connection of a short-lived caller', async () => {
      const handler = await open({ capacity: 2 });

      await runAsCaller('request-42', async () => {
        await handler.emit({ level: 'info', message: 'one' });
        await handler.emit({ level: 'info', message: 'two' });
        await handler.releaseConnection();
      });

      expect(handler.stats().connections).toBe(1);
      expect(await countRows(dbPath)).toBe(2);
    });

    it('logs timer flush failures with the dropped count', async () => {
      const handler = await open({ flushInterval: 0.05 });
      const db = createAdapter({ filename: dbPath });
      await db.exec('DROP TABLE logs');
      await db.close();

      await handler.emit({ level: 'info', message: 'one' });
      await handler.emit({ level: 'info', message: 'two' });

      await vi.waitFor(() => expect(logger.entries.some((entry) => entry.level === 'error')).toBe(true), {
        timeout: 2000,
      });
      const failure = logger.entries.find((entry) => entry.level === 'error');
      expect(failure).toMatchObject({
        message: 'Background flush failed, batch dropped',
        meta: { batchSize: 2, droppedRecords: 2 },
        bindings: { component: 'log-sqlite', table: 'logs' },
      });
      expect(failure?.error).toBeInstanceOf(FlushError);
    });
  });

  describe('stored rows', () => {
    it('round-trips additional fields and keeps the rest in extra', async () => {
      const handler = await open({ additionalFields: [['user_id', 'TEXT']] });

      await handler.emit({
        level: 'info',
        loggerName: 'auth',
        message: 'login by %s',
        args: ['ann'],
        extra: { user_id: 'abc', route: '/login' },
      });
      await handler.close();

      const rows = await queryRows<Record<string, unknown>>(
        dbPath,
        'SELECT level, level_name, logger_name, message, user_id, extra, exception_info FROM logs',
      );
      expect(rows).toEqual([
        {
          level: 30,
          level_name: 'info',
          logger_name: 'auth',
          message: 'login by ann',
          user_id: 'abc',
          extra: '{"route":"/login"}',
          exception_info: null,
        },
      ]);
    });

    it('stores the exception payload as JSON', async () => {
      const handler = await open();
      const error = new TypeError('bad input');

      await handler.emit({ level: 'error', message: 'failed', error });
      await handler.close();

      const [row] = await queryRows<{ exception_info: string }>(dbPath, 'SELECT exception_info FROM logs');
      expect(JSON.parse(row?.exception_info ?? 'null')).toEqual({
        message: 'bad input',
        stack: error.stack,
        type: 'TypeError',
      });
    });

    it('stores fallback text for values JSON cannot represent', async () => {
      const onSerializationFallback = vi.fn<(error: SerializationError) => void>();
      const handler = await createHandler({ path: dbPath, flushInterval: 0 }, { logger, onSerializationFallback });
      handlers.push(handler);

      await handler.emit({ level: 'info', message: 'odd', extra: { size: 10n, ok: 'yes' } });
      await handler.close();

      const [row] = await queryRows<{ extra: string }>(dbPath, 'SELECT extra FROM logs');
      expect(row?.extra).toBe('{"ok":"yes","size":"10"}');
      expect(onSerializationFallback).toHaveBeenCalledTimes(1);
      expect(logger.entries.find((entry) => entry.level === 'warn')?.meta).toEqual({ path: 'extra.size' });
    });

    it('shares a table between two handlers', async () => {
      const first = await open({ additionalFields: [['user_id', 'TEXT']] });
      const second = await open({ additionalFields: [['user_id', 'TEXT']] });

      await first.emit({ level: 'info', message: 'from first', extra: { user_id: 'u1' } });
      await second.emit({ level: 'info', message: 'from second', extra: { user_id: 'u2' } });
      await first.close();
      await second.close();

      const columns = await queryRows<{ name: string }>(dbPath, 'PRAGMA table_info("logs")');
      expect(columns.filter((column) => column.name === 'user_id')).toHaveLength(1);
      const indexes = await queryRows<{ name: string }>(
        dbPath,
        "SELECT name FROM sqlite_master WHERE type = 'index' AND name LIKE 'idx_logs_%'",
      );
      expect(indexes).toHaveLength(3);
      expect(await countRows(dbPath)).toBe(2);
    });

    it('works against an in-memory database', async () => {
      const handler = await createHandler({ path: ':memory:', capacity: 2, flushInterval: 0 }, { logger });
      handlers.push(handler);

      await handler.emit({ level: 'info', message: 'a' });
      await handler.emit({ level: 'info', message: 'b' });

      expect(handler.stats()).toMatchObject({ flushes: 1, flushedRecords: 2, connections: 1 });
    });
  });
});
