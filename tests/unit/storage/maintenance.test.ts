/**
 * Unit Tests for maintenance operations
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { deriveChildId } from '../../../src/services/loader/nested-router.js';
import { dropColumn, splitJsonColumns } from '../../../src/services/storage/maintenance.js';
import {
  captureError,
  createTestDatabase,
  createTestLoader,
  getColumnTypes,
  selectAll,
  type TestDatabase,
} from '../loader/helpers.js';

describe('dropColumn', () => {
  let t: TestDatabase;

  beforeEach(() => {
    t = createTestDatabase();
    t.db.exec('CREATE TABLE launches (id TEXT PRIMARY KEY, name TEXT, details TEXT)');
  });

  afterEach(() => {
    if (t.db.open) t.db.close();
  });

  it('drops an existing column', () => {
    expect(dropColumn(t.conn, 'launches', 'details')).toBe(true);
    expect(getColumnTypes(t.db, 'launches')).toEqual({ id: 'TEXT', name: 'TEXT' });
  });

  it('folds the column name before looking it up', () => {
    expect(dropColumn(t.conn, 'launches', 'Details')).toBe(true);
    expect(getColumnTypes(t.db, 'launches')).toEqual({ id: 'TEXT', name: 'TEXT' });
  });

  it('returns false for a column that does not exist', () => {
    expect(dropColumn(t.conn, 'launches', 'missing')).toBe(false);
    expect(dropColumn(t.conn, 'rockets', 'name')).toBe(false);
  });

  it('raises SCHEMA_CONFLICT when SQLite refuses the drop', () => {
    const error = captureError(() => dropColumn(t.conn, 'launches', 'id'));

    expect(error).toMatchObject({ category: 'SCHEMA_CONFLICT', details: { table: 'launches', column: 'id' } });
    expect(t.db.inTransaction).toBe(false);
  });
});

describe('splitJsonColumns', () => {
  let t: TestDatabase;

  beforeEach(() => {
    t = createTestDatabase();
  });

  afterEach(() => {
    t.db.close();
  });

  it('moves inline documents into child tables and drops the columns', () => {
    createTestLoader(t.conn, { nestedStrategy: 'inline' }).loadRecords('launches', [
      { id: 'L1', name: 'A', rocket: { name: 'Falcon9' }, tags: ['x', 'y'] },
      { id: 'L2', name: 'B', rocket: { name: 'Falcon Heavy' } },
    ]);

    const report = splitJsonColumns(createTestLoader(t.conn), 'launches');

    expect(report.columns).toEqual([
      { column: 'rocket', childTable: 'launches_rocket', rowsMigrated: 2, rowsFailed: 0, dropped: true },
      { column: 'tags', childTable: 'launches_tags', rowsMigrated: 1, rowsFailed: 0, dropped: true },
    ]);
    expect(report.failures).toEqual([]);
    expect(getColumnTypes(t.db, 'launches')).toEqual({ id: 'TEXT', name: 'TEXT' });
    expect(selectAll(t.db, 'SELECT launches_id, name FROM launches_rocket ORDER BY launches_id')).toEqual([
      { launches_id: 'L1', name: 'Falcon9' },
      { launches_id: 'L2', name: 'Falcon Heavy' },
    ]);
    expect(selectAll(t.db, 'SELECT id, value FROM launches_tags ORDER BY item_index')).toEqual([
      { id: deriveChildId('launches', 'L1', 'tags', 0), value: 'x' },
      { id: deriveChildId('launches', 'L1', 'tags', 1), value: 'y' },
    ]);
  });

  it('matches the rows a split load would have written', () => {
    const record = { id: 'L1', rocket: { name: 'Falcon9', stages: 2 } };
    createTestLoader(t.conn, { nestedStrategy: 'inline' }).loadRecords('launches', [record]);
    splitJsonColumns(createTestLoader(t.conn), 'launches');
    const afterSplit = selectAll(t.db, 'SELECT * FROM launches_rocket');

    createTestLoader(t.conn).loadRecords('launches', [record]);

    expect(selectAll(t.db, 'SELECT * FROM launches_rocket')).toEqual(afterSplit);
  });

  it('keeps the column when a stored value is not a JSON object or array', () => {
    createTestLoader(t.conn, { nestedStrategy: 'inline' }).loadRecords('launches', [
      { id: 'L1', rocket: { name: 'Falcon9' } },
    ]);
    t.db.exec(`INSERT INTO launches (id, rocket) VALUES ('L2', 'not json')`);

    const report = splitJsonColumns(createTestLoader(t.conn), 'launches');

    expect(report.columns).toEqual([
      { column: 'rocket', childTable: 'launches_rocket', rowsMigrated: 1, rowsFailed: 1, dropped: false },
    ]);
    expect(report.failures).toHaveLength(1);
    expect(report.failures[0]).toMatchObject({ table: 'launches_rocket', recordId: 'L2' });
    expect(report.failures[0]?.error.category).toBe('SCHEMA_CONFLICT');
    expect(getColumnTypes(t.db, 'launches').rocket).toBe('JSON_TEXT');
  });

  it('splits TEXT columns that hold JSON objects', () => {
    t.db.exec('CREATE TABLE launches (id TEXT PRIMARY KEY, name TEXT, data TEXT)');
    t.db.exec(`INSERT INTO launches VALUES ('L1', 'A', '{"rocket":"Falcon9","flight":1}'), ('L2', 'B', NULL)`);

    const report = splitJsonColumns(createTestLoader(t.conn), 'launches');

    expect(report.columns).toEqual([
      { column: 'data', childTable: 'launches_data', rowsMigrated: 1, rowsFailed: 0, dropped: true },
    ]);
    expect(getColumnTypes(t.db, 'launches')).toEqual({ id: 'TEXT', name: 'TEXT' });
    expect(selectAll(t.db, 'SELECT id, launches_id, rocket, flight FROM launches_data')).toEqual([
      { id: deriveChildId('launches', 'L1', 'data'), launches_id: 'L1', rocket: 'Falcon9', flight: 1 },
    ]);
  });

  it('raises CONFIGURATION_ERROR for a missing table', () => {
    expect(captureError(() => splitJsonColumns(createTestLoader(t.conn), 'rockets'))).toMatchObject({
      category: 'CONFIGURATION_ERROR',
      message: 'Table "rockets" does not exist',
    });
  });

  it('does nothing for a table without JSON columns', () => {
    t.db.exec('CREATE TABLE rockets (id TEXT PRIMARY KEY, name TEXT)');

    expect(splitJsonColumns(createTestLoader(t.conn), 'rockets')).toEqual({
      table: 'rockets',
      columns: [],
      failures: [],
    });
  });
});
