/**
 * @module @logsink/core/levels
 * Numeric severity scale shared with pino.
 */

export const LOG_LEVELS = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

const LEVEL_LABELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

const LABELS = new Map<number, LogLevel>(
  LEVEL_LABELS.map((label) => [LOG_LEVELS[label], label]),
);

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Label for a numeric level. Numbers off the scale become `level-<n>`.
 */
export function levelName(level: number): string {
  return LABELS.get(level) ?? `level-${level}`;
}

/**
 * Numeric value for a level given either as a label or a number.
 */
export function levelValue(level: LogLevel | number): number {
  return typeof level === 'number' ? level : LOG_LEVELS[level];
}
