/**
 * Column type inference
 *
 * Decides the type of a NEW column from the first value seen for it. Existing
 * columns are never re-inferred, so a column's type only ever comes from here
 * once.
 *
 * @module schema/type-inferencer
 */

import { ColumnType } from '../../models/schema.js';
import { isBooleanString, type FieldValue } from '../../models/value.js';

export interface InferenceOptions {
  /**
   * Treat the strings "true"/"false" (any case) as BOOLEAN. Kept on by default
   * so tables loaded by earlier versions keep their column types.
   */
  legacyBooleanStrings: boolean;
}

export const DEFAULT_INFERENCE_OPTIONS: InferenceOptions = {
  legacyBooleanStrings: true,
};

/**
 * Infer the column type for a value. First matching rule wins:
 * bool, integer, float, legacy boolean string, string, document, null.
 */
export function inferColumnType(
  value: FieldValue,
  options: InferenceOptions = DEFAULT_INFERENCE_OPTIONS
): ColumnType {
  switch (value.kind) {
    case 'bool':
      return ColumnType.BOOLEAN;
    case 'int':
      return ColumnType.INTEGER;
    case 'float':
      return ColumnType.REAL;
    case 'text':
      return options.legacyBooleanStrings && isBooleanString(value.value)
        ? ColumnType.BOOLEAN
        : ColumnType.TEXT;
    case 'document':
      return ColumnType.JSON_DOCUMENT;
    case 'null':
      return ColumnType.TEXT;
  }
}
