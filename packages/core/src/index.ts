/**
 * @module @logsink/core
 * Contracts shared by logsink adapters.
 */

export type { ILogger } from './logger.js';
export type { ISQLDatabase, SQLQueryResult, SQLValue } from './database.js';
export { LOG_LEVELS, isLogLevel, levelName, levelValue } from './levels.js';
export type { LogLevel } from './levels.js';
