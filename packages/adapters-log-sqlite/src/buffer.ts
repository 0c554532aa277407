/**
 * @module @logsink/adapters-log-sqlite/buffer
 * Pending record list and the flush decision.
 *
 * Swapping the pending list out is the only point where records leave the
 * buffer. It runs synchronously, so size-triggered and timer-triggered
 * flushes never see the same record.
 */

import { ClosedHandlerError, FlushError } from './errors.js';
import type { LogRecord } from './record.js';

export type BufferState = 'active' | 'flushing' | 'closed';

/**
 * Writes one batch. Rejects when the batch was not stored.
 */
export type BatchSink = (batch: readonly LogRecord[]) => Promise<void>;

export interface BufferStats {
  /** Records waiting for the next flush */
  pending: number;
  /** Batches being written right now */
  inFlight: number;
  /** Batches written */
  flushes: number;
  flushedRecords: number;
  failedFlushes: number;
  /** Records lost to failed flushes */
  droppedRecords: number;
}

export interface RecordBufferOptions {
  /** Pending count that triggers a flush */
  capacity: number;
  sink: BatchSink;
}

export class RecordBuffer {
  private readonly capacity: number;
  private readonly sink: BatchSink;
  private pendingRecords: LogRecord[] = [];
  private readonly inFlight = new Set<Promise<void>>();
  private closed = false;
  private flushes = 0;
  private flushedRecords = 0;
  private failedFlushes = 0;
  private droppedRecords = 0;

  constructor(options: RecordBufferOptions) {
    this.capacity = options.capacity;
    this.sink = options.sink;
  }

  get state(): BufferState {
    if (this.closed) {
      return 'closed';
    }
    return this.inFlight.size > 0 ? 'flushing' : 'active';
  }

  get pending(): number {
    return this.pendingRecords.length;
  }

  /**
   * Append `record`. On reaching capacity the full list is swapped out and
   * written; the promise settles with that write.
   *
   * @throws ClosedHandlerError after `close()`
   * @throws FlushError when the size-triggered write fails
   */
  async enqueue(record: LogRecord): Promise<void> {
    if (this.closed) {
      throw new ClosedHandlerError('enqueue a record');
    }

    this.pendingRecords.push(record);
    if (this.pendingRecords.length < this.capacity) {
      return;
    }

    await this.write(this.drain());
  }

  /**
   * Swap out everything pending, possibly nothing.
   */
  drain(): readonly LogRecord[] {
    const batch = this.pendingRecords;
    this.pendingRecords = [];
    return batch;
  }

  /**
   * Drain and write. An empty drain does not reach the sink.
   *
   * @throws FlushError when the write fails
   */
  async drainAndFlush(): Promise<void> {
    const batch = this.drain();
    if (batch.length === 0) {
      return;
    }
    await this.write(batch);
  }

  /**
   * Refuse further records, write what is pending once, and wait for
   * writes already in flight. Later calls return immediately.
   *
   * @throws FlushError when the final write fails
   */
  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;

    const running = [...this.inFlight];
    try {
      await this.drainAndFlush();
    } finally {
      await Promise.allSettled(running);
    }
  }

  stats(): BufferStats {
    return {
      pending: this.pendingRecords.length,
      inFlight: this.inFlight.size,
      flushes: this.flushes,
      flushedRecords: this.flushedRecords,
      failedFlushes: this.failedFlushes,
      droppedRecords: this.droppedRecords,
    };
  }

  private async write(batch: readonly LogRecord[]): Promise<void> {
    const task = this.flushBatch(batch);
    this.inFlight.add(task);
    try {
      await task;
    } finally {
      this.inFlight.delete(task);
    }
  }

  private async flushBatch(batch: readonly LogRecord[]): Promise<void> {
    try {
      await this.sink(batch);
    } catch (error) {
      // At-most-once: the batch is not requeued
      this.failedFlushes++;
      this.droppedRecords += batch.length;
      throw error instanceof FlushError ? error : new FlushError(batch.length, { cause: error });
    }
    this.flushes++;
    this.flushedRecords += batch.length;
  }
}
