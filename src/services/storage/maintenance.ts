/**
 * Schema maintenance operations
 *
 * Explicit, destructive operations that never run on the load path: dropping
 * a column, and moving JSON document columns (written by the inline nested
 * strategy, or older TEXT columns holding JSON objects) into child tables.
 *
 * @module storage/maintenance
 */

import { configurationError, LoaderError, schemaConflictError } from '../../errors.js';
import { isJsonObject, isJsonValue, type JsonObject, type JsonValue } from '../../models/record.js';
import { ColumnType } from '../../models/schema.js';
import type { JsonTableLoader } from '../loader/loader.js';
import type { RouteFailure } from '../loader/nested-router.js';
import { childTableName, quoteIdentifier, toIdentifier } from '../schema/identifiers.js';
import type { StorageConnection } from './types.js';

export interface ColumnSplitResult {
  column: string;
  childTable: string;
  rowsMigrated: number;
  rowsFailed: number;
  /** The JSON column is only dropped when every row moved cleanly */
  dropped: boolean;
}

export interface SplitReport {
  table: string;
  columns: ColumnSplitResult[];
  failures: RouteFailure[];
}

/**
 * Drop a column if it exists
 *
 * @returns true when the column existed and was dropped
 * @throws LoaderError SCHEMA_CONFLICT when SQLite refuses the drop
 */
export function dropColumn(conn: StorageConnection, table: string, column: string): boolean {
  const target = toIdentifier(column);
  const name = conn.listColumns(table).find((c) => c.name.toLowerCase() === target)?.name;
  if (name === undefined) {
    return false;
  }

  try {
    conn.execute(`ALTER TABLE ${quoteIdentifier(table)} DROP COLUMN ${quoteIdentifier(name)}`);
    conn.commit();
  } catch (error) {
    conn.rollback();
    if (error instanceof LoaderError && error.category === 'FATAL_CONNECTION') {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[Maintenance] Error dropping column ${table}.${name}: ${reason}`);
    throw schemaConflictError(table, `Failed to drop column "${name}" from "${table}": ${reason}`, name, error);
  }

  console.error(`[Maintenance] Dropped column ${table}.${name}`);
  return true;
}

/**
 * Move every JSON column of `table` into `{table}_{column}` child tables,
 * routing each stored document the same way a fresh load would. JSON columns
 * are JSON_DOCUMENT columns, plus TEXT columns whose first stored value is a
 * JSON object.
 *
 * @throws LoaderError CONFIGURATION_ERROR when the table does not exist
 */
export function splitJsonColumns(loader: JsonTableLoader, table: string): SplitReport {
  if (!loader.catalog.tableExists(table)) {
    throw configurationError(`Table "${table}" does not exist`, { table });
  }
  const report: SplitReport = { table, columns: [], failures: [] };
  const jsonColumns = [...loader.catalog.columns(table)]
    .filter(([name, type]) => {
      if (type === ColumnType.JSON_DOCUMENT) return true;
      return type === ColumnType.TEXT && name !== 'id' && holdsJsonObjects(loader.conn, table, name);
    })
    .map(([name]) => name);

  for (const column of jsonColumns) {
    const result: ColumnSplitResult = {
      column,
      childTable: childTableName(table, column),
      rowsMigrated: 0,
      rowsFailed: 0,
      dropped: false,
    };

    const rows = loader.conn.query(
      `SELECT ${quoteIdentifier('id')} AS id, ${quoteIdentifier(column)} AS doc ` +
        `FROM ${quoteIdentifier(table)} WHERE ${quoteIdentifier(column)} IS NOT NULL`
    );

    for (const row of rows) {
      const parentId = String(row.id);
      const value = parseDocument(row.doc);
      if (value === undefined) {
        console.error(`[Maintenance] ${table}.${column} id=${parentId} does not hold a JSON object or array`);
        result.rowsFailed++;
        report.failures.push({
          table: result.childTable,
          recordId: parentId,
          error: schemaConflictError(
            table,
            `Value of "${column}" for "${parentId}" is not a JSON object or array`,
            column
          ),
        });
        continue;
      }

      const outcome = loader.router.route({ field: column, value, parentTable: table, parentId, depth: 1 });
      report.failures.push(...outcome.failures);
      if (outcome.failures.length > 0) {
        result.rowsFailed++;
      } else {
        result.rowsMigrated++;
      }
    }

    if (result.rowsFailed === 0) {
      result.dropped = dropColumn(loader.conn, table, column);
    }
    console.error(
      `[Maintenance] Split ${table}.${column} into ${result.childTable}: ` +
        `${result.rowsMigrated} migrated, ${result.rowsFailed} failed`
    );
    report.columns.push(result);
  }

  return report;
}

function holdsJsonObjects(conn: StorageConnection, table: string, column: string): boolean {
  const [sample] = conn.query(
    `SELECT ${quoteIdentifier(column)} AS doc FROM ${quoteIdentifier(table)} ` +
      `WHERE ${quoteIdentifier(column)} IS NOT NULL LIMIT 1`
  );
  const value = sample === undefined ? undefined : parseDocument(sample.doc);
  return value !== undefined && isJsonObject(value);
}

function parseDocument(raw: unknown): JsonObject | JsonValue[] | undefined {
  if (typeof raw !== 'string') {
    return undefined;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (!isJsonValue(parsed) || parsed === null || typeof parsed !== 'object') {
    return undefined;
  }
  return parsed;
}
