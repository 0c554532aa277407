/**
 * @module @logsink/adapters-log-sqlite/config
 * Handler configuration schema and defaults.
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

/** Column type used when an additional field declares none */
export const DEFAULT_FIELD_TYPE = 'TEXT';

const additionalFieldSchema = z
  .union([
    z.object({
      name: z.string().min(1),
      type: z.string().min(1).optional(),
    }),
    z.tuple([z.string().min(1), z.string().min(1)]),
  ])
  .transform((field) =>
    Array.isArray(field)
      ? { name: field[0], type: field[1] }
      : { name: field.name, type: field.type ?? DEFAULT_FIELD_TYPE },
  );

export const handlerConfigSchema = z.object({
  /** Database file path, or ':memory:' */
  path: z.string().min(1),
  /** Target table (default: 'logs') */
  tableName: z.string().min(1).default('logs'),
  /** Pending record count that triggers an immediate flush (default: 1000) */
  capacity: z.number().int().positive().default(1000),
  /** Seconds between timer flushes, 0 disables the timer (default: 5) */
  flushInterval: z.number().finite().nonnegative().default(5),
  /** Extra columns, in order, as { name, type } or [name, type] */
  additionalFields: z.array(additionalFieldSchema).default([]),
  /** Milliseconds SQLite waits on a locked database (default: 5000) */
  busyTimeout: z.number().int().nonnegative().default(5000),
});

export type LogHandlerConfig = z.input<typeof handlerConfigSchema>;

export interface AdditionalField {
  readonly name: string;
  readonly type: string;
}

export interface ResolvedHandlerConfig {
  readonly path: string;
  readonly tableName: string;
  readonly capacity: number;
  readonly flushInterval: number;
  readonly additionalFields: readonly AdditionalField[];
  readonly busyTimeout: number;
}

/**
 * Validate `input` and apply defaults. The result is frozen.
 *
 * @throws ConfigError listing every failed check
 */
export function resolveConfig(input: LogHandlerConfig): ResolvedHandlerConfig {
  const result = handlerConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`),
    );
  }

  const { additionalFields, ...rest } = result.data;
  return Object.freeze({
    ...rest,
    additionalFields: Object.freeze(additionalFields.map((field) => Object.freeze(field))),
  });
}
