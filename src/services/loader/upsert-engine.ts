/**
 * UpsertEngine - idempotent insert-or-update of one row
 *
 * Reconciles the row's flat fields against the live table, then writes it with
 * INSERT … ON CONFLICT(id) DO UPDATE. Only columns present in the row are
 * updated; columns the row does not mention keep their stored value.
 *
 * @module loader/upsert-engine
 */

import { LoaderError, schemaConflictError, writeError } from '../../errors.js';
import type { JsonObject } from '../../models/record.js';
import { ColumnType, DECLARED_TYPES, type FlatFields } from '../../models/schema.js';
import type { SqlValue } from '../../models/value.js';
import type { SchemaCatalog } from '../schema/catalog.js';
import { quoteIdentifier } from '../schema/identifiers.js';
import type { SchemaMigrator } from '../schema/migrator.js';
import type { StorageConnection } from '../storage/types.js';
import { bindValue } from './coercion.js';
import { DEFAULT_MAX_DEPTH, flatten, type ExtractedFragment, type NestedStrategy } from './flattener.js';

export interface UpsertOptions {
  nestedStrategy: NestedStrategy;
  /** Nesting limit for inline JSON documents */
  maxDepth: number;
  /** Suppress per-row info logging */
  quiet: boolean;
}

export const DEFAULT_UPSERT_OPTIONS: UpsertOptions = {
  nestedStrategy: 'split',
  maxDepth: DEFAULT_MAX_DEPTH,
  quiet: false,
};

export type UpsertResult =
  | { ok: true; id: string; fragments: ExtractedFragment[] }
  | { ok: false; id: string | null; error: LoaderError };

/**
 * Build the upsert statement for a row
 *
 * @param columns - Non-id column names, in binding order
 */
export function buildUpsertSql(table: string, columns: readonly string[]): string {
  const names = [quoteIdentifier('id'), ...columns.map(quoteIdentifier)];
  const placeholders = names.map(() => '?').join(', ');
  const conflict =
    columns.length === 0
      ? 'DO NOTHING'
      : 'DO UPDATE SET ' +
        columns.map((c) => `${quoteIdentifier(c)} = excluded.${quoteIdentifier(c)}`).join(', ');

  return (
    `INSERT INTO ${quoteIdentifier(table)} (${names.join(', ')}) ` +
    `VALUES (${placeholders}) ` +
    `ON CONFLICT (${quoteIdentifier('id')}) ${conflict}`
  );
}

export class UpsertEngine {
  constructor(
    private readonly conn: StorageConnection,
    private readonly catalog: SchemaCatalog,
    private readonly migrator: SchemaMigrator,
    private readonly options: UpsertOptions = DEFAULT_UPSERT_OPTIONS
  ) {}

  /**
   * Upsert one root record. Record-level failures are returned; a lost
   * connection is thrown.
   */
  upsert(table: string, record: JsonObject): UpsertResult {
    let recordId: string | null = null;
    try {
      const { id, fields, fragments } = flatten(record, table, this.options.nestedStrategy, this.options.maxDepth);
      recordId = id;
      this.migrator.ensureTable(table, DECLARED_TYPES[ColumnType.TEXT]);
      this.writeRow(table, id, fields);
      return { ok: true, id, fragments };
    } catch (error) {
      const loaderError = LoaderError.fromUnknown(error, 'WRITE_ERROR');
      if (loaderError.category === 'FATAL_CONNECTION') {
        throw loaderError;
      }
      return { ok: false, id: recordId, error: loaderError };
    }
  }

  /**
   * Reconcile and write one row of an existing table.
   *
   * @throws LoaderError SCHEMA_CONFLICT when a needed column could not be added
   * @throws LoaderError WRITE_ERROR when the statement fails (after rollback)
   */
  writeRow(table: string, id: string, fields: FlatFields): void {
    const live = this.catalog.columns(table);
    const { missingColumns } = this.catalog.diffColumns(live, fields);

    if (missingColumns.length > 0) {
      const { added, failed } = this.migrator.ensureColumns(table, missingColumns);
      for (const column of added) {
        live.set(column.name, column.type);
      }
      if (failed.length > 0) {
        const names = failed.map((f) => f.column.name);
        throw schemaConflictError(
          table,
          `Record "${id}" needs columns that could not be added to "${table}": ${names.join(', ')}`,
          names[0],
          failed[0]?.error
        );
      }
    }

    const columns = [...fields.keys()];
    const params: SqlValue[] = [id];
    for (const [name, value] of fields) {
      params.push(bindValue(value, live.get(name) ?? ColumnType.TEXT));
    }

    try {
      this.conn.execute(buildUpsertSql(table, columns), params);
      this.conn.commit();
    } catch (error) {
      this.conn.rollback();
      if (error instanceof LoaderError && error.category === 'FATAL_CONNECTION') {
        throw error;
      }
      console.error(
        `[Upsert] Error inserting/updating ${table} id=${id}: ${error instanceof Error ? error.message : String(error)}`
      );
      throw writeError(table, id, error);
    }

    if (!this.options.quiet) {
      console.error(`[Upsert] Inserted/updated ${table} id=${id}`);
    }
  }
}
