/**
 * Shared Test Helpers for Loader Tests
 *
 * In-memory databases, schema introspection and a failure-injecting
 * StorageConnection for the loader, schema and maintenance suites.
 */

import Database from 'better-sqlite3';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { JsonTableLoader, type LoaderOptions } from '../../../src/services/loader/loader.js';
import { SqliteConnection } from '../../../src/services/storage/connection.js';
import { configurePragmas } from '../../../src/services/storage/database.js';
import type { Row, StorageConnection } from '../../../src/services/storage/types.js';
import type { ColumnInfo } from '../../../src/models/schema.js';
import type { SqlValue } from '../../../src/models/value.js';

export interface TestDatabase {
  db: Database.Database;
  conn: SqliteConnection;
}

/**
 * Fresh in-memory database with the production pragmas
 */
export function createTestDatabase(): TestDatabase {
  const db = new Database(':memory:');
  configurePragmas(db);
  return { db, conn: new SqliteConnection(db) };
}

/**
 * Loader with per-row logging switched off
 */
export function createTestLoader(
  conn: StorageConnection,
  options: Partial<LoaderOptions> = {}
): JsonTableLoader {
  return new JsonTableLoader(conn, { quiet: true, ...options });
}

/**
 * Helper to get column name → declared type from SQLite
 */
export function getColumnTypes(db: Database.Database, tableName: string): Record<string, string> {
  const rows = db.prepare(`PRAGMA table_info("${tableName}")`).all() as Array<{ name: string; type: string }>;
  return Object.fromEntries(rows.map((row) => [row.name, row.type]));
}

/**
 * Helper to get all table names from database
 */
export function getTableNames(db: Database.Database): string[] {
  const result = db
    .prepare(
      `
    SELECT name FROM sqlite_master
    WHERE type = 'table' AND name NOT LIKE 'sqlite_%'
    ORDER BY name
  `
    )
    .all() as Array<{ name: string }>;
  return result.map((row) => row.name);
}

export function selectAll(db: Database.Database, sql: string): Row[] {
  return db.prepare(sql).all() as Row[];
}

/**
 * Create a temp directory under the prefix global-teardown cleans up
 */
export function createTempDir(label: string): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), `jtl-${label}-`));
}

/**
 * StorageConnection that fails every execute() whose SQL contains `pattern`
 */
export class FailingConnection implements StorageConnection {
  constructor(
    private readonly inner: StorageConnection,
    private readonly pattern: string
  ) {}

  listColumns(table: string): ColumnInfo[] {
    return this.inner.listColumns(table);
  }

  listTables(): string[] {
    return this.inner.listTables();
  }

  execute(sql: string, params?: readonly SqlValue[]): number {
    if (sql.includes(this.pattern)) {
      throw new Error('simulated failure');
    }
    return this.inner.execute(sql, params);
  }

  query(sql: string, params?: readonly SqlValue[]): Row[] {
    return this.inner.query(sql, params);
  }

  commit(): void {
    this.inner.commit();
  }

  rollback(): void {
    this.inner.rollback();
  }
}

/**
 * Run fn and return what it threw, or undefined
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
