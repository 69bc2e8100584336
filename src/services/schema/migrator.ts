/**
 * SchemaMigrator - additive schema changes
 *
 * Only CREATE TABLE and ADD COLUMN happen here. Each change is committed on
 * its own before any DML that depends on it, and one failed ADD COLUMN never
 * stops the others.
 *
 * @module schema/migrator
 */

import { LoaderError, schemaConflictError } from '../../errors.js';
import {
  DECLARED_TYPES,
  type ColumnSpec,
  type ParentLink,
  type SchemaChange,
} from '../../models/schema.js';
import type { StorageConnection } from '../storage/types.js';
import { quoteIdentifier } from './identifiers.js';

export interface ColumnFailure {
  column: ColumnSpec;
  error: LoaderError;
}

export interface EnsureColumnsResult {
  added: ColumnSpec[];
  failed: ColumnFailure[];
}

export interface MigratorOptions {
  /** Suppress info logging of applied changes */
  quiet: boolean;
}

export class SchemaMigrator {
  private readonly changes: SchemaChange[] = [];

  constructor(
    private readonly conn: StorageConnection,
    private readonly options: MigratorOptions = { quiet: false }
  ) {}

  /**
   * Create the table if it does not exist yet.
   *
   * @param pkType - Declared type of the `id` primary key
   * @param parent - Parent link for child tables
   * @returns true when the table was created by this call
   * @throws LoaderError SCHEMA_CONFLICT when CREATE TABLE fails
   */
  ensureTable(table: string, pkType: string, parent?: ParentLink): boolean {
    if (this.conn.listColumns(table).length > 0) {
      return false;
    }

    const definitions = [`${quoteIdentifier('id')} ${pkType} PRIMARY KEY`];
    if (parent) {
      definitions.push(
        `${quoteIdentifier(parent.column)} ${parent.idType} NOT NULL ` +
          `REFERENCES ${quoteIdentifier(parent.table)} (${quoteIdentifier('id')})`
      );
    }
    const sql = `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(table)} (\n  ${definitions.join(',\n  ')}\n)`;

    try {
      this.conn.execute(sql);
      this.conn.commit();
    } catch (error) {
      this.conn.rollback();
      if (error instanceof LoaderError && error.category === 'FATAL_CONNECTION') {
        throw error;
      }
      const reason = error instanceof Error ? error.message : String(error);
      console.error(`[Migrator] Failed to create table ${table}: ${reason}`);
      throw schemaConflictError(table, `Failed to create table "${table}": ${reason}`, undefined, error);
    }

    this.record({ kind: 'create_table', table });
    return true;
  }

  /**
   * Add each missing column in its own committed unit.
   * A column that another writer added in the meantime counts as added.
   */
  ensureColumns(table: string, missing: readonly ColumnSpec[]): EnsureColumnsResult {
    const result: EnsureColumnsResult = { added: [], failed: [] };

    for (const column of missing) {
      const declared = DECLARED_TYPES[column.type];
      const sql =
        `ALTER TABLE ${quoteIdentifier(table)} ` +
        `ADD COLUMN ${quoteIdentifier(column.name)} ${declared}`;
      try {
        this.conn.execute(sql);
        this.conn.commit();
        this.record({ kind: 'add_column', table, column: column.name, type: declared });
        result.added.push(column);
      } catch (error) {
        this.conn.rollback();
        if (error instanceof LoaderError && error.category === 'FATAL_CONNECTION') {
          throw error;
        }
        if (this.columnExists(table, column.name)) {
          result.added.push(column);
          continue;
        }
        const reason = error instanceof Error ? error.message : String(error);
        console.error(`[Migrator] Error adding column ${table}.${column.name}: ${reason}`);
        result.failed.push({
          column,
          error: schemaConflictError(
            table,
            `Failed to add column "${column.name}" to "${table}": ${reason}`,
            column.name,
            error
          ),
        });
      }
    }

    return result;
  }

  /**
   * Schema changes applied through this migrator, oldest first
   */
  getAppliedChanges(): readonly SchemaChange[] {
    return this.changes;
  }

  private columnExists(table: string, column: string): boolean {
    return this.conn.listColumns(table).some((c) => c.name.toLowerCase() === column);
  }

  private record(change: SchemaChange): void {
    this.changes.push(change);
    if (this.options.quiet) return;
    if (change.kind === 'create_table') {
      console.error(`[Migrator] Created table ${change.table}`);
    } else {
      console.error(`[Migrator] Added column ${change.table}.${change.column} (${change.type})`);
    }
  }
}
