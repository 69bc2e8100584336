/**
 * SqliteConnection - StorageConnection over better-sqlite3
 *
 * A transaction is opened by the first execute() after a commit/rollback, so
 * callers only mark boundaries. Errors that mean the connection itself is
 * unusable (closed handle, I/O, corruption, full disk) are raised as
 * FATAL_CONNECTION; everything else is rethrown as the driver's SqliteError.
 *
 * @module storage/connection
 */

import type Database from 'better-sqlite3';
import { fatalConnectionError } from '../../errors.js';
import type { ColumnInfo } from '../../models/schema.js';
import type { SqlValue } from '../../models/value.js';
import { quoteIdentifier } from '../schema/identifiers.js';
import type { Row, StorageConnection } from './types.js';

/**
 * SQLite result code prefixes after which the connection cannot be trusted
 */
const FATAL_CODE_PREFIXES = [
  'SQLITE_IOERR',
  'SQLITE_CORRUPT',
  'SQLITE_NOTADB',
  'SQLITE_CANTOPEN',
  'SQLITE_FULL',
  'SQLITE_READONLY',
] as const;

interface TableInfoRow {
  cid: number;
  name: string;
  type: string;
  notnull: number;
  dflt_value: unknown;
  pk: number;
}

/**
 * Whether an error thrown by better-sqlite3 means the connection is lost
 */
export function isFatalSqliteError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  const code: unknown = Reflect.get(error, 'code');
  if (typeof code === 'string' && FATAL_CODE_PREFIXES.some((prefix) => code.startsWith(prefix))) {
    return true;
  }
  return error.message.includes('database connection is not open');
}

export class SqliteConnection implements StorageConnection {
  constructor(private readonly db: Database.Database) {}

  listColumns(table: string): ColumnInfo[] {
    return this.guard(() => {
      const rows = this.db.prepare(`PRAGMA table_info(${quoteIdentifier(table)})`).all() as TableInfoRow[];
      return rows.map((row) => ({
        name: row.name,
        declaredType: row.type,
        primaryKey: row.pk > 0,
      }));
    });
  }

  listTables(): string[] {
    return this.guard(() => {
      const rows = this.db
        .prepare(
          `
        SELECT name FROM sqlite_master
        WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
        ORDER BY name
      `
        )
        .all() as Array<{ name: string }>;
      return rows.map((row) => row.name);
    });
  }

  execute(sql: string, params: readonly SqlValue[] = []): number {
    return this.guard(() => {
      if (!this.db.inTransaction) {
        this.db.exec('BEGIN');
      }
      return this.db.prepare(sql).run(...params).changes;
    });
  }

  query(sql: string, params: readonly SqlValue[] = []): Row[] {
    return this.guard(() => this.db.prepare(sql).all(...params) as Row[]);
  }

  commit(): void {
    this.guard(() => {
      if (this.db.inTransaction) {
        this.db.exec('COMMIT');
      }
    });
  }

  rollback(): void {
    this.guard(() => {
      if (this.db.inTransaction) {
        this.db.exec('ROLLBACK');
      }
    });
  }

  getConnection(): Database.Database {
    return this.db;
  }

  private guard<T>(fn: () => T): T {
    if (!this.db.open) {
      throw fatalConnectionError('Database connection is not open');
    }
    try {
      return fn();
    } catch (error) {
      if (isFatalSqliteError(error)) {
        const reason = error instanceof Error ? error.message : String(error);
        throw fatalConnectionError(`Storage connection failed: ${reason}`, error);
      }
      throw error;
    }
  }
}
