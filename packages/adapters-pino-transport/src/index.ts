/**
 * @module @logsink/adapters-pino-transport
 * Pino transport storing log lines in SQLite through the buffered log handler.
 *
 * Pino runs the transport in a worker thread and writes one JSON line per
 * log call. Each line becomes a LogEvent; the handler batches and writes it.
 *
 * @example
 * ```typescript
 * import { pino } from 'pino';
 *
 * const logger = pino({
 *   transport: {
 *     target: '@logsink/adapters-pino-transport',
 *     options: {
 *       path: '.data/logs.db',
 *       capacity: 200,
 *       flushInterval: 1,
 *       additionalFields: [['reqId', 'TEXT']],
 *     },
 *   },
 * });
 *
 * logger.info({ reqId: 'req-1' }, 'request served');
 * ```
 */

import build from 'pino-abstract-transport';
import { destination } from 'pino';
import { createAdapter as createPinoLogger } from '@logsink/adapters-pino';
import {
  createHandler,
  type LogEvent,
  type LogHandlerConfig,
  type LogHandlerDeps,
} from '@logsink/adapters-log-sqlite';

/**
 * Transport options: the handler configuration, passed through pino's
 * `transport.options`.
 */
export type SQLiteTransportOptions = LogHandlerConfig;

/** Keys of a pino line that map to record columns rather than extra */
const MAPPED_KEYS = new Set(['level', 'time', 'msg', 'name', 'pid', 'err']);

/**
 * Convert one parsed pino line. Returns null for anything without a
 * numeric level.
 */
export function toLogEvent(line: unknown): LogEvent | null {
  if (typeof line !== 'object' || line === null || !('level' in line) || typeof line.level !== 'number') {
    return null;
  }

  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(line)) {
    if (!MAPPED_KEYS.has(key)) {
      extra[key] = value;
    }
  }

  return {
    level: line.level,
    message: 'msg' in line && typeof line.msg === 'string' ? line.msg : '',
    ...('name' in line && typeof line.name === 'string' && { loggerName: line.name }),
    ...('time' in line && typeof line.time === 'number' && { timestamp: line.time }),
    ...('pid' in line && typeof line.pid === 'number' && { process: { id: line.pid, name: process.title } }),
    ...('err' in line && line.err !== undefined && line.err !== null && { error: line.err }),
    ...(Object.keys(extra).length > 0 && { extra }),
  };
}

/**
 * Create the transport stream.
 *
 * This is the main export pino calls when loading the transport. The
 * handler is closed, with a final flush, when pino closes the stream.
 */
export default async function sqliteTransport(options: SQLiteTransportOptions, deps: LogHandlerDeps = {}) {
  const logger = deps.logger ?? createPinoLogger({ level: 'warn', destination: destination(2) });
  const handler = await createHandler(options, { ...deps, logger });
  const diagnostics = logger.child({ component: 'pino-transport' });

  return build(
    async (source) => {
      source.on('unknown', (line: string, error: unknown) => {
        diagnostics.warn('Skipping line that is not JSON', {
          line,
          reason: error instanceof Error ? error.message : String(error),
        });
      });

      for await (const chunk of source) {
        const line: unknown = chunk;
        const event = toLogEvent(line);
        if (!event) {
          diagnostics.warn('Skipping line without a numeric level', { line });
          continue;
        }

        try {
          await handler.emit(event);
        } catch (error) {
          // The handler already counted the dropped batch
          diagnostics.error(
            'Failed to store log line',
            error instanceof Error ? error : new Error(String(error)),
            { pending: handler.stats().pending },
          );
        }
      }
    },
    {
      close: async () => {
        await handler.close();
      },
    },
  );
}
