/**
 * @module @logsink/adapters-log-sqlite/flusher
 * Periodic timer driving time-based flushes.
 */

import type { ILogger } from '@logsink/core';
import { runAsCaller } from './caller-scope.js';
import { FlushError } from './errors.js';

/** Caller name of every timer tick, so ticks get their own connection */
export const FLUSHER_CALLER = 'logsink-flush';

export interface BackgroundFlusherOptions {
  /** Seconds between ticks; 0 never starts the timer */
  intervalSeconds: number;
  flush: () => Promise<void>;
  logger: ILogger;
  /** Extra fields logged with a failed tick */
  describe?: () => Record<string, unknown>;
}

export class BackgroundFlusher {
  private readonly intervalMs: number;
  private readonly flush: () => Promise<void>;
  private readonly logger: ILogger;
  private readonly describe: () => Record<string, unknown>;
  private timer: NodeJS.Timeout | null = null;
  private running: Promise<void> | null = null;

  constructor(options: BackgroundFlusherOptions) {
    this.intervalMs = options.intervalSeconds * 1000;
    this.flush = options.flush;
    this.logger = options.logger;
    this.describe = options.describe ?? (() => ({}));
  }

  get active(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer || this.intervalMs <= 0) {
      return;
    }

    this.timer = setInterval(() => {
      this.tick();
    }, this.intervalMs);

    // Don't keep process alive for flush timer
    this.timer.unref();
  }

  /**
   * Cancel future ticks. Safe to call any number of times.
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /**
   * Resolves once the tick in progress, if any, has finished.
   */
  async idle(): Promise<void> {
    await this.running;
  }

  private tick(): void {
    // Skip while the previous tick is still writing
    if (this.running) {
      return;
    }

    this.running = runAsCaller(FLUSHER_CALLER, () => this.flush())
      .catch((error: unknown) => {
        const err = error instanceof Error ? error : new Error(String(error));
        this.logger.error('Background flush failed, batch dropped', err, {
          ...(error instanceof FlushError && { batchSize: error.batchSize }),
          ...this.describe(),
        });
      })
      .finally(() => {
        this.running = null;
      });
  }
}
