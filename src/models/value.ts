/**
 * Tagged field values
 *
 * Flattened records hold FieldValue, a closed union, instead of raw JSON so
 * inference, coercion and binding can switch over every case exhaustively.
 * Booleans keep their own tag all the way to the storage boundary, where they
 * are bound as 1/0.
 */

import type { JsonValue } from './record.js';

export type FieldValue =
  | { kind: 'null' }
  | { kind: 'bool'; value: boolean }
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'text'; value: string }
  /** Serialized JSON text of an object or array */
  | { kind: 'document'; value: string };

/**
 * Values a prepared statement can bind
 */
export type SqlValue = string | number | bigint | null;

export const NULL_VALUE: FieldValue = { kind: 'null' };

const LEGACY_BOOLEAN_STRINGS = new Set(['true', 'false']);

/**
 * Whether a string is one of the legacy "true"/"false" spellings
 */
export function isBooleanString(value: string): boolean {
  return LEGACY_BOOLEAN_STRINGS.has(value.toLowerCase());
}

/**
 * Tag a raw JSON value
 */
export function toFieldValue(value: JsonValue): FieldValue {
  if (value === null) {
    return NULL_VALUE;
  }
  if (typeof value === 'boolean') {
    return { kind: 'bool', value };
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? { kind: 'int', value } : { kind: 'float', value };
  }
  if (typeof value === 'string') {
    return { kind: 'text', value };
  }
  return { kind: 'document', value: JSON.stringify(value) };
}

/**
 * Storage-safe representation of a value, without regard to column type
 */
export function toSqlValue(value: FieldValue): SqlValue {
  switch (value.kind) {
    case 'null':
      return null;
    case 'bool':
      return value.value ? 1 : 0;
    case 'int':
    case 'float':
    case 'text':
    case 'document':
      return value.value;
  }
}

/**
 * Plain JSON form of a value, used when a scalar lands in a JSON_DOCUMENT column
 */
export function toJsonText(value: FieldValue): string | null {
  switch (value.kind) {
    case 'null':
      return null;
    case 'document':
      return value.value;
    case 'bool':
    case 'int':
    case 'float':
    case 'text':
      return JSON.stringify(value.value);
  }
}
