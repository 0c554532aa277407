/**
 * @module @logsink/adapters-log-sqlite/writer
 * Turns a batch into one transactional insert.
 */

import type { ConnectionProvider } from './connections.js';
import { FlushError } from './errors.js';
import { toRow, type LogRecord } from './record.js';
import type { SchemaManager } from './schema.js';

export class BatchWriter {
  private readonly insertSQL: string;

  constructor(
    private readonly schema: SchemaManager,
    private readonly connections: ConnectionProvider,
  ) {
    this.insertSQL = schema.insertSQL();
  }

  /**
   * Insert every record of `batch`, in order, in one transaction on the
   * current caller's connection. Not retried.
   *
   * @throws FlushError when the store rejects the batch; no row is kept
   * @throws ConnectionError or ClosedHandlerError when no connection is available
   */
  async flush(batch: readonly LogRecord[]): Promise<void> {
    if (batch.length === 0) {
      return;
    }

    const rows = batch.map((record) => toRow(record, this.schema.insertColumns));
    const connection = this.connections.connectionForCurrentCaller();

    try {
      await connection.batch(this.insertSQL, rows);
    } catch (error) {
      throw new FlushError(batch.length, { cause: error });
    }
  }
}
