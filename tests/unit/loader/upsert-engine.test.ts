/**
 * Unit Tests for UpsertEngine
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { SchemaCatalog } from '../../../src/services/schema/catalog.js';
import { SchemaMigrator } from '../../../src/services/schema/migrator.js';
import { buildUpsertSql, UpsertEngine } from '../../../src/services/loader/upsert-engine.js';
import type { StorageConnection } from '../../../src/services/storage/types.js';
import {
  captureError,
  createTestDatabase,
  FailingConnection,
  selectAll,
  type TestDatabase,
} from './helpers.js';

function createEngine(conn: StorageConnection, nestedStrategy: 'split' | 'inline' = 'split'): UpsertEngine {
  const catalog = new SchemaCatalog(conn);
  const migrator = new SchemaMigrator(conn, { quiet: true });
  return new UpsertEngine(conn, catalog, migrator, { nestedStrategy, maxDepth: 32, quiet: true });
}

describe('buildUpsertSql', () => {
  it('updates every non-id column on conflict', () => {
    expect(buildUpsertSql('launches', ['name', 'window'])).toBe(
      'INSERT INTO "launches" ("id", "name", "window") VALUES (?, ?, ?) ' +
        'ON CONFLICT ("id") DO UPDATE SET "name" = excluded."name", "window" = excluded."window"'
    );
  });

  it('does nothing on conflict when the row only has an id', () => {
    expect(buildUpsertSql('launches', [])).toBe(
      'INSERT INTO "launches" ("id") VALUES (?) ON CONFLICT ("id") DO NOTHING'
    );
  });
});

describe('UpsertEngine', () => {
  let t: TestDatabase;

  beforeEach(() => {
    t = createTestDatabase();
  });

  afterEach(() => {
    if (t.db.open) t.db.close();
  });

  it('creates the table and returns nested fragments', () => {
    const engine = createEngine(t.conn);
    const result = engine.upsert('launches', { id: 'L1', name: 'A', cores: [{ serial: 'B1' }] });

    expect(result).toEqual({ ok: true, id: 'L1', fragments: [{ field: 'cores', value: [{ serial: 'B1' }] }] });
    expect(selectAll(t.db, 'SELECT * FROM launches')).toEqual([{ id: 'L1', name: 'A' }]);
  });

  it('is idempotent', () => {
    const engine = createEngine(t.conn);
    engine.upsert('launches', { id: 'L1', name: 'A', flight: 1 });
    engine.upsert('launches', { id: 'L1', name: 'A', flight: 1 });

    expect(selectAll(t.db, 'SELECT * FROM launches')).toEqual([{ id: 'L1', name: 'A', flight: 1 }]);
  });

  it('leaves columns the record does not mention untouched', () => {
    const engine = createEngine(t.conn);
    engine.upsert('launches', { id: 'L1', name: 'A', flight: 1 });
    engine.upsert('launches', { id: 'L1', flight: 2 });

    expect(selectAll(t.db, 'SELECT * FROM launches')).toEqual([{ id: 'L1', name: 'A', flight: 2 }]);
  });

  it('returns MISSING_IDENTIFIER without writing', () => {
    const engine = createEngine(t.conn);
    const result = engine.upsert('launches', { name: 'A' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.id).toBeNull();
      expect(result.error.category).toBe('MISSING_IDENTIFIER');
    }
    expect(selectAll(t.db, 'SELECT * FROM launches')).toEqual([]);
  });

  it('returns WRITE_ERROR and rolls back when the statement fails', () => {
    const engine = createEngine(new FailingConnection(t.conn, 'INSERT INTO'));
    const result = engine.upsert('launches', { id: 'L1', name: 'A' });

    expect(result).toMatchObject({ ok: false, id: 'L1' });
    if (!result.ok) {
      expect(result.error.category).toBe('WRITE_ERROR');
      expect(result.error.message).toBe('Failed to upsert "L1" into "launches": simulated failure');
      expect(result.error.details).toEqual({ table: 'launches', recordId: 'L1' });
    }
    expect(t.db.inTransaction).toBe(false);
    expect(selectAll(t.db, 'SELECT name FROM pragma_table_info(\'launches\')')).toEqual([
      { name: 'id' },
      { name: 'name' },
    ]);
  });

  it('throws FATAL_CONNECTION instead of returning it', () => {
    const engine = createEngine(t.conn);
    t.db.close();

    expect(captureError(() => engine.upsert('launches', { id: 'L1' }))).toMatchObject({
      category: 'FATAL_CONNECTION',
    });
  });
});
