/**
 * Database opening and connection pragmas
 *
 * @module storage/database
 */

import Database from 'better-sqlite3';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import { fatalConnectionError } from '../../errors.js';

/**
 * Per-connection pragmas. SQLite does not persist these, so they are applied
 * on every open. foreign_keys makes child-table parent links enforced.
 */
export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA busy_timeout = 30000',
] as const;

/**
 * Configure database pragmas
 * @param db - Database instance
 */
export function configurePragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    try {
      db.exec(pragma);
    } catch (error) {
      throw fatalConnectionError(`Failed to set pragma: ${pragma}`, error);
    }
  }
}

/**
 * Open (creating if needed) a SQLite database file, or ':memory:'
 */
export function openDatabase(path: string): Database.Database {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  let db: Database.Database;
  try {
    db = new Database(path);
  } catch (error) {
    throw fatalConnectionError(`Failed to open database at ${path}: ${String(error)}`, error);
  }

  try {
    configurePragmas(db);
  } catch (error) {
    db.close();
    throw error;
  }
  return db;
}
