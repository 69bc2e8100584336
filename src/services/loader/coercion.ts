/**
 * Write-time value coercion
 *
 * A value is bound according to the live type of the column it lands in, so a
 * column that was widened to TEXT or JSON_DOCUMENT keeps receiving values of
 * that type. Booleans are bound as 1/0 everywhere except TEXT/JSON columns.
 *
 * @module loader/coercion
 */

import { ColumnType } from '../../models/schema.js';
import { isBooleanString, toJsonText, toSqlValue, type FieldValue, type SqlValue } from '../../models/value.js';

export function bindValue(value: FieldValue, column: ColumnType): SqlValue {
  switch (column) {
    case ColumnType.JSON_DOCUMENT:
      return toJsonText(value);

    case ColumnType.TEXT:
      return toText(value);

    case ColumnType.BOOLEAN:
      if (value.kind === 'text' && isBooleanString(value.value)) {
        return value.value.toLowerCase() === 'true' ? 1 : 0;
      }
      return toSqlValue(value);

    case ColumnType.INTEGER:
    case ColumnType.REAL:
      return toSqlValue(value);
  }
}

function toText(value: FieldValue): string | null {
  switch (value.kind) {
    case 'null':
      return null;
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'int':
    case 'float':
      return String(value.value);
    case 'text':
    case 'document':
      return value.value;
  }
}
