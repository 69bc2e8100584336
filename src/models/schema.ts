/**
 * Relational schema model
 *
 * ColumnType is the loader's own type vocabulary. Each tag maps to one declared
 * SQLite type; declared types written by other tools are read back through
 * SQLite's affinity rules.
 */

import type { FieldValue } from './value.js';
import type { JsonObject, JsonValue } from './record.js';

export enum ColumnType {
  INTEGER = 'INTEGER',
  REAL = 'REAL',
  BOOLEAN = 'BOOLEAN',
  TEXT = 'TEXT',
  JSON_DOCUMENT = 'JSON_DOCUMENT',
}

/**
 * Declared SQLite type for each column type.
 * JSON_TEXT keeps TEXT affinity so "5" stored as a document is not re-read as 5.
 */
export const DECLARED_TYPES: Record<ColumnType, string> = {
  [ColumnType.INTEGER]: 'INTEGER',
  [ColumnType.REAL]: 'REAL',
  [ColumnType.BOOLEAN]: 'BOOLEAN',
  [ColumnType.TEXT]: 'TEXT',
  [ColumnType.JSON_DOCUMENT]: 'JSON_TEXT',
};

/**
 * Map a declared column type back to a ColumnType.
 * Order matters: JSON_TEXT contains TEXT, BIGINT contains INT.
 */
export function columnTypeFromDeclared(declared: string): ColumnType {
  const upper = declared.toUpperCase();
  if (upper.includes('JSON')) return ColumnType.JSON_DOCUMENT;
  if (upper.includes('BOOL')) return ColumnType.BOOLEAN;
  if (upper.includes('INT')) return ColumnType.INTEGER;
  if (upper.includes('CHAR') || upper.includes('CLOB') || upper.includes('TEXT')) return ColumnType.TEXT;
  if (
    upper.includes('REAL') ||
    upper.includes('FLOA') ||
    upper.includes('DOUB') ||
    upper.includes('NUM') ||
    upper.includes('DEC')
  ) {
    return ColumnType.REAL;
  }
  return ColumnType.TEXT;
}

/**
 * One live column as reported by the storage engine
 */
export interface ColumnInfo {
  name: string;
  /** Declared type as written in the DDL */
  declaredType: string;
  primaryKey: boolean;
}

/**
 * Column definition inferred from a record value
 */
export interface ColumnSpec {
  name: string;
  type: ColumnType;
}

/**
 * Result of comparing a record's fields to the live table
 */
export interface SchemaDiff {
  tableExists: boolean;
  missingColumns: ColumnSpec[];
}

/**
 * Link from a child table to its parent table's primary key
 */
export interface ParentLink {
  /** Parent table name */
  table: string;
  /** Column in the child table holding the parent id, `{parent}_id` */
  column: string;
  /** Declared type of the parent's id column */
  idType: string;
}

/**
 * Flat column-name → value mapping of one row
 */
export type FlatFields = Map<string, FieldValue>;

/**
 * Nested object or array extracted from a record, to be stored in a child table
 */
export interface NestedFragment {
  /** Column-safe field name the value was found under */
  field: string;
  value: JsonObject | JsonValue[];
  parentTable: string;
  parentId: string;
  /** Nesting depth of the child table (root table children are depth 1) */
  depth: number;
}

/**
 * One applied schema change
 */
export type SchemaChange =
  | { kind: 'create_table'; table: string }
  | { kind: 'add_column'; table: string; column: string; type: string };
