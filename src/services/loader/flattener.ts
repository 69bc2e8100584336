/**
 * RecordFlattener
 *
 * Turns one JSON object into a flat column → FieldValue map plus the nested
 * objects/arrays that belong in child tables. Nested values are never inlined
 * under dotted prefixes, so a table's column count does not grow with nesting
 * depth.
 *
 * @module loader/flattener
 */

import { invalidRecordError, missingIdentifierError, nestingTooDeepError } from '../../errors.js';
import { exceedsDepth, RecordIdSchema, type JsonObject, type JsonValue } from '../../models/record.js';
import type { FlatFields } from '../../models/schema.js';
import { toFieldValue } from '../../models/value.js';
import { IdentifierError, toIdentifier } from '../schema/identifiers.js';

/**
 * How nested objects and arrays are stored.
 * - split: one child table per nested field (default)
 * - inline: a JSON_DOCUMENT column on the same table
 */
export type NestedStrategy = 'split' | 'inline';

/** Deepest nesting level that is stored, as a child table or inside a JSON document */
export const DEFAULT_MAX_DEPTH = 32;

export interface ExtractedFragment {
  field: string;
  value: JsonObject | JsonValue[];
}

export interface FlattenedFields {
  /** Raw value found under the `id` key, if any */
  rawId: JsonValue | undefined;
  /** Every other scalar field, keyed by column name */
  fields: FlatFields;
  fragments: ExtractedFragment[];
}

export interface FlattenedRecord extends FlattenedFields {
  id: string;
}

/**
 * Flatten an object without requiring an identifier. Used directly for
 * child rows, whose ids may be derived.
 *
 * @throws LoaderError NESTING_TOO_DEEP when an inline document is nested
 *   deeper than maxDepth
 */
export function flattenFields(
  record: JsonObject,
  strategy: NestedStrategy = 'split',
  maxDepth = DEFAULT_MAX_DEPTH,
  table = ''
): FlattenedFields {
  const fields: FlatFields = new Map();
  const fragments: ExtractedFragment[] = [];
  const sourceKeys = new Map<string, string>();
  let rawId: JsonValue | undefined;

  for (const [key, value] of Object.entries(record)) {
    const column = foldKey(key);
    const previous = sourceKeys.get(column);
    if (previous !== undefined) {
      throw invalidRecordError(`Keys "${previous}" and "${key}" both map to column "${column}"`, {
        column,
      });
    }
    sourceKeys.set(column, key);

    if (column === 'id') {
      rawId = value;
      continue;
    }

    if (value !== null && typeof value === 'object') {
      if (strategy === 'split') {
        fragments.push({ field: column, value });
        continue;
      }
      if (exceedsDepth(value, maxDepth)) {
        throw nestingTooDeepError(table, maxDepth + 1, maxDepth, column);
      }
    }

    fields.set(column, toFieldValue(value));
  }

  return { rawId, fields, fragments };
}

/**
 * Flatten a root record, which must carry an identifier.
 *
 * @throws LoaderError MISSING_IDENTIFIER when `id` is absent, null or ""
 * @throws LoaderError INVALID_RECORD when `id` is not a string or integer,
 *   or two keys fold to the same column
 * @throws LoaderError NESTING_TOO_DEEP under the inline strategy
 */
export function flatten(
  record: JsonObject,
  table: string,
  strategy: NestedStrategy = 'split',
  maxDepth = DEFAULT_MAX_DEPTH
): FlattenedRecord {
  const flattened = flattenFields(record, strategy, maxDepth, table);
  return { ...flattened, id: requireRecordId(flattened.rawId, table) };
}

/**
 * Normalize a raw `id` value to its stored string form
 */
export function requireRecordId(rawId: JsonValue | undefined, table: string): string {
  if (rawId === undefined || rawId === null || rawId === '') {
    throw missingIdentifierError(table);
  }
  const parsed = RecordIdSchema.safeParse(rawId);
  if (!parsed.success) {
    throw invalidRecordError(`Record "id" in "${table}" must be a string or an integer`, {
      table,
      id: rawId,
    });
  }
  return String(parsed.data);
}

/**
 * Read a usable identifier if present, without failing
 */
export function optionalRecordId(rawId: JsonValue | undefined): string | undefined {
  const parsed = RecordIdSchema.safeParse(rawId);
  return parsed.success ? String(parsed.data) : undefined;
}

function foldKey(key: string): string {
  try {
    return toIdentifier(key);
  } catch (error) {
    if (error instanceof IdentifierError) {
      throw invalidRecordError(error.message, { key });
    }
    throw error;
  }
}
