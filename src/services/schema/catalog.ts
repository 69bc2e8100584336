/**
 * SchemaCatalog - live schema reads and diffs
 *
 * Nothing is cached: every call asks the storage engine, so columns added or
 * removed by another writer between two records are seen by the next diff.
 *
 * @module schema/catalog
 */

import {
  ColumnType,
  columnTypeFromDeclared,
  DECLARED_TYPES,
  type ColumnSpec,
  type FlatFields,
  type SchemaDiff,
} from '../../models/schema.js';
import type { StorageConnection } from '../storage/types.js';
import { DEFAULT_INFERENCE_OPTIONS, inferColumnType, type InferenceOptions } from './type-inferencer.js';

export class SchemaCatalog {
  constructor(
    private readonly conn: StorageConnection,
    private readonly inference: InferenceOptions = DEFAULT_INFERENCE_OPTIONS
  ) {}

  /**
   * Live columns of a table, name → ColumnType. Empty when the table is absent.
   */
  columns(table: string): Map<string, ColumnType> {
    const columns = new Map<string, ColumnType>();
    for (const column of this.conn.listColumns(table)) {
      columns.set(column.name.toLowerCase(), columnTypeFromDeclared(column.declaredType));
    }
    return columns;
  }

  tableExists(table: string): boolean {
    return this.conn.listColumns(table).length > 0;
  }

  /**
   * Declared type of a table's `id` column, TEXT when unknown
   */
  idType(table: string): string {
    const id = this.conn.listColumns(table).find((column) => column.name.toLowerCase() === 'id');
    return id && id.declaredType.length > 0 ? id.declaredType : DECLARED_TYPES[ColumnType.TEXT];
  }

  /**
   * Compare a row's fields with the live table. Every field the table lacks is
   * returned with the type inferred from this row's value.
   */
  diff(table: string, fields: FlatFields): SchemaDiff {
    return this.diffColumns(this.columns(table), fields);
  }

  /**
   * Same as diff(), against columns the caller already read
   */
  diffColumns(live: ReadonlyMap<string, ColumnType>, fields: FlatFields): SchemaDiff {
    const missingColumns: ColumnSpec[] = [];
    for (const [name, value] of fields) {
      if (!live.has(name)) {
        missingColumns.push({ name, type: inferColumnType(value, this.inference) });
      }
    }
    return { tableExists: live.size > 0, missingColumns };
  }
}
