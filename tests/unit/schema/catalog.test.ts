/**
 * Unit Tests for SchemaCatalog
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ColumnType, type FlatFields } from '../../../src/models/schema.js';
import { SchemaCatalog } from '../../../src/services/schema/catalog.js';
import { createTestDatabase, type TestDatabase } from '../loader/helpers.js';

describe('SchemaCatalog', () => {
  let t: TestDatabase;
  let catalog: SchemaCatalog;

  beforeEach(() => {
    t = createTestDatabase();
    catalog = new SchemaCatalog(t.conn);
    t.db.exec('CREATE TABLE launches (id TEXT PRIMARY KEY, name TEXT, Flight INTEGER, meta JSON_TEXT)');
  });

  afterEach(() => {
    t.db.close();
  });

  it('reads live columns with lowercased names', () => {
    expect([...catalog.columns('launches')]).toEqual([
      ['id', ColumnType.TEXT],
      ['name', ColumnType.TEXT],
      ['flight', ColumnType.INTEGER],
      ['meta', ColumnType.JSON_DOCUMENT],
    ]);
  });

  it('returns an empty map for a missing table', () => {
    expect(catalog.columns('rockets').size).toBe(0);
    expect(catalog.tableExists('rockets')).toBe(false);
    expect(catalog.tableExists('launches')).toBe(true);
  });

  it('reports the declared id type, TEXT when unknown', () => {
    t.db.exec('CREATE TABLE cores (id INTEGER PRIMARY KEY)');
    expect(catalog.idType('cores')).toBe('INTEGER');
    expect(catalog.idType('launches')).toBe('TEXT');
    expect(catalog.idType('rockets')).toBe('TEXT');
  });

  it('lists only the fields the table lacks, typed from the row', () => {
    const fields: FlatFields = new Map([
      ['name', { kind: 'int', value: 5 }],
      ['upcoming', { kind: 'bool', value: false }],
      ['details', { kind: 'null' }],
    ]);

    expect(catalog.diff('launches', fields)).toEqual({
      tableExists: true,
      missingColumns: [
        { name: 'upcoming', type: ColumnType.BOOLEAN },
        { name: 'details', type: ColumnType.TEXT },
      ],
    });
  });

  it('sees columns added by another writer on the next read', () => {
    const fields: FlatFields = new Map([['upcoming', { kind: 'bool', value: true }]]);
    expect(catalog.diff('launches', fields).missingColumns).toHaveLength(1);

    t.db.exec('ALTER TABLE launches ADD COLUMN upcoming BOOLEAN');

    expect(catalog.diff('launches', fields).missingColumns).toEqual([]);
  });
});
