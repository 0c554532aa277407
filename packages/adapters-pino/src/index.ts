/**
 * @module @logsink/adapters-pino
 * Pino adapter implementing ILogger interface.
 *
 * @example
 * ```typescript
 * import { createAdapter } from '@logsink/adapters-pino';
 *
 * const logger = createAdapter({
 *   level: 'info',
 *   pretty: true,
 * });
 *
 * logger.info('Handler started', { table: 'logs' });
 * logger.error('Flush failed', new Error('disk I/O error'));
 *
 * const childLogger = logger.child({ component: 'log-sqlite' });
 * childLogger.debug('Batch written');
 * ```
 */

import { pino, type DestinationStream, type Logger as PinoLoggerInstance, type LoggerOptions } from 'pino';
import type { ILogger, LogLevel } from '@logsink/core';

/**
 * Configuration for Pino logger adapter.
 */
export interface PinoLoggerConfig {
  /** Log level (default: 'info') */
  level?: LogLevel | 'silent';
  /** Enable pretty printing for development (default: false) */
  pretty?: boolean;
  /** Additional pino options */
  options?: LoggerOptions;
  /** Write lines to this stream instead of stdout (ignored when pretty) */
  destination?: DestinationStream;
}

/**
 * Pino implementation of ILogger interface.
 */
export class PinoLoggerAdapter implements ILogger {
  private pino: PinoLoggerInstance;

  constructor(config: PinoLoggerConfig | PinoLoggerInstance = {}) {
    this.pino = isPinoInstance(config) ? config : createPino(config);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.pino.info(meta ?? {}, message);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.pino.warn(meta ?? {}, message);
  }

  error(message: string, error?: Error, meta?: Record<string, unknown>): void {
    const enrichedMeta = {
      ...meta,
      // Not `err`: pino's err serializer would replace this object
      ...(error && {
        error: {
          name: error.name,
          message: error.message,
          stack: error.stack,
          ...(error.cause !== undefined && { cause: describeCause(error.cause) }),
        },
      }),
    };
    this.pino.error(enrichedMeta, message);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.pino.debug(meta ?? {}, message);
  }

  child(bindings: Record<string, unknown>): ILogger {
    return new PinoLoggerAdapter(this.pino.child(bindings));
  }
}

function createPino(config: PinoLoggerConfig): PinoLoggerInstance {
  const options: LoggerOptions = {
    level: config.level ?? 'info',
    ...config.options,
  };

  if (config.pretty) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    });
  }

  return config.destination ? pino(options, config.destination) : pino(options);
}

function isPinoInstance(value: PinoLoggerConfig | PinoLoggerInstance): value is PinoLoggerInstance {
  return 'child' in value && typeof value.child === 'function';
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? `${cause.name}: ${cause.message}` : String(cause);
}

/**
 * Create Pino logger adapter.
 */
export function createAdapter(config?: PinoLoggerConfig): PinoLoggerAdapter {
  return new PinoLoggerAdapter(config);
}

// Default export for direct import
export default createAdapter;
