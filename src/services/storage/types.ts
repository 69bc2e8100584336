/**
 * Storage capability used by the loader core
 *
 * The core never touches a driver directly: catalog reads, DDL, DML and
 * transaction boundaries all go through StorageConnection, so a different
 * engine only needs a new implementation of this interface.
 */

import type { ColumnInfo } from '../../models/schema.js';
import type { SqlValue } from '../../models/value.js';

export type Row = Record<string, unknown>;

export interface StorageConnection {
  /** Live columns of `table`; empty when the table does not exist */
  listColumns(table: string): ColumnInfo[];

  /** User tables, sorted by name */
  listTables(): string[];

  /**
   * Run one DDL or DML statement with positional parameters.
   * Opens a transaction when none is active.
   *
   * @returns Number of rows changed
   */
  execute(sql: string, params?: readonly SqlValue[]): number;

  /** Run a SELECT and return all rows */
  query(sql: string, params?: readonly SqlValue[]): Row[];

  /** Make every statement since the last commit durable */
  commit(): void;

  /** Discard every statement since the last commit */
  rollback(): void;
}
