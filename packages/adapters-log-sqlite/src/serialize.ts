/**
 * @module @logsink/adapters-log-sqlite/serialize
 * Conversion of arbitrary caller data to canonical JSON.
 *
 * Unserializable leaves are replaced by a string and reported; a value as a
 * whole is never rejected.
 */

import { SerializationError } from './errors.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type FallbackReporter = (error: SerializationError) => void;

/**
 * Convert `value` to plain JSON data with object keys in sorted order.
 * Returns `undefined` for `undefined`, which objects drop and arrays store as null.
 *
 * @param path - location reported with fallbacks, e.g. `extra.user`
 */
export function toJsonValue(value: unknown, report?: FallbackReporter, path = '$'): JsonValue | undefined {
  return convert(value, path, new Set<object>(), report);
}

/**
 * Canonical JSON text for `value`. `undefined` serializes as `null`.
 */
export function toCanonicalJson(value: unknown, report?: FallbackReporter, path = '$'): string {
  return JSON.stringify(toJsonValue(value, report, path) ?? null);
}

function convert(
  value: unknown,
  path: string,
  ancestors: Set<object>,
  report: FallbackReporter | undefined,
): JsonValue | undefined {
  const fallback = (text: string, reason: string): string => {
    report?.(new SerializationError(path, text, reason));
    return text;
  };

  switch (typeof value) {
    case 'undefined':
      return undefined;
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : fallback(String(value), 'non-finite number');
    case 'bigint':
      return fallback(value.toString(), 'bigint');
    case 'symbol':
      return fallback(value.toString(), 'symbol');
    case 'function':
      return fallback(`[Function: ${value.name || 'anonymous'}]`, 'function');
  }

  if (value === null || typeof value !== 'object') {
    return null;
  }
  if (ancestors.has(value)) {
    return fallback('[Circular]', 'circular reference');
  }
  if (value instanceof Error) {
    return `${value.name}: ${value.message}`;
  }

  ancestors.add(value);
  try {
    return convertObject(value, path, ancestors, report);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return fallback(Object.prototype.toString.call(value), `threw while reading: ${reason}`);
  } finally {
    ancestors.delete(value);
  }
}

function convertObject(
  value: object,
  path: string,
  ancestors: Set<object>,
  report: FallbackReporter | undefined,
): JsonValue | undefined {
  if ('toJSON' in value && typeof value.toJSON === 'function') {
    const json: unknown = value.toJSON();
    return convert(json, path, ancestors, report);
  }

  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return items.map((item, index) => convert(item, `${path}[${index}]`, ancestors, report) ?? null);
  }

  if (value instanceof Set) {
    const items: unknown[] = [...value];
    return items.map((item, index) => convert(item, `${path}[${index}]`, ancestors, report) ?? null);
  }

  const entries: Array<[string, unknown]> =
    value instanceof Map
      ? [...value.entries()].map(([key, item]): [string, unknown] => [String(key), item])
      : Object.entries(value);

  const result: JsonObject = {};
  for (const [key, item] of entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    const converted = convert(item, `${path}.${key}`, ancestors, report);
    if (converted !== undefined) {
      result[key] = converted;
    }
  }
  return result;
}
