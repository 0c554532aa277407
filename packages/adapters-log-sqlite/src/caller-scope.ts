/**
 * @module @logsink/adapters-log-sqlite/caller-scope
 * Identity of the execution context that emits or flushes records.
 *
 * A caller is the current thread unless code runs inside `runAsCaller()`,
 * in which case the name follows the async context across awaits.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { isMainThread, threadId } from 'node:worker_threads';

const callerStorage = new AsyncLocalStorage<string>();

export interface CallerIdentity {
  /** Worker thread id, 0 on the main thread */
  threadId: number;
  /** Caller name, or the thread name outside `runAsCaller()` */
  threadName: string;
}

export function threadName(): string {
  return isMainThread ? 'main' : `worker-${threadId}`;
}

/**
 * Run `fn` as the named caller. Connections and record thread names
 * resolved inside `fn` belong to `name`.
 *
 * Each distinct name that writes gets its own SQLite connection, kept until
 * the handler closes. Short-lived names should end with
 * `handler.releaseConnection()` inside `fn`.
 */
export function runAsCaller<T>(name: string, fn: () => T): T {
  return callerStorage.run(name, fn);
}

export function currentCallerName(): string {
  return callerStorage.getStore() ?? threadName();
}

export function currentCaller(): CallerIdentity {
  return { threadId, threadName: currentCallerName() };
}
