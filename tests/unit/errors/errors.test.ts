/**
 * Unit Tests for LoaderError and the error factories
 */

import { describe, it, expect } from 'vitest';
import {
  fatalConnectionError,
  getRecoveryHint,
  LoaderError,
  missingIdentifierError,
  nestingTooDeepError,
  schemaConflictError,
  writeError,
} from '../../../src/errors.js';
import { ValidationError, validateInput } from '../../../src/utils/validation.js';
import { JsonObjectSchema } from '../../../src/models/record.js';
import { IdentifierError } from '../../../src/services/schema/identifiers.js';

describe('LoaderError.fromUnknown', () => {
  it('returns a LoaderError unchanged', () => {
    const error = fatalConnectionError('gone');
    expect(LoaderError.fromUnknown(error)).toBe(error);
  });

  it('maps known error names to categories', () => {
    expect(LoaderError.fromUnknown(new ValidationError('bad')).category).toBe('INVALID_RECORD');
    expect(LoaderError.fromUnknown(new IdentifierError('bad', '')).category).toBe('INVALID_RECORD');
  });

  it('keeps the original error as cause and its code in details', () => {
    const original = Object.assign(new Error('constraint failed'), { code: 'SQLITE_CONSTRAINT' });
    const error = LoaderError.fromUnknown(original, 'WRITE_ERROR');

    expect(error.category).toBe('WRITE_ERROR');
    expect(error.cause).toBe(original);
    expect(error.details).toEqual({ originalName: 'Error', errorCode: 'SQLITE_CONSTRAINT' });
  });

  it('wraps non-Error values with the default category', () => {
    const error = LoaderError.fromUnknown('plain string');

    expect(error.category).toBe('INTERNAL_ERROR');
    expect(error.message).toBe('plain string');
    expect(error.details).toEqual({ originalValue: 'plain string' });
  });
});

describe('error factories', () => {
  it('marks record-level categories as record scoped', () => {
    expect(missingIdentifierError('launches').isRecordScoped()).toBe(true);
    expect(nestingTooDeepError('launches_a', 3, 2).isRecordScoped()).toBe(true);
    expect(fatalConnectionError('gone').isRecordScoped()).toBe(false);
  });

  it('carries table, record and column context', () => {
    expect(writeError('launches', 'L1', new Error('boom'))).toMatchObject({
      category: 'WRITE_ERROR',
      message: 'Failed to upsert "L1" into "launches": boom',
      details: { table: 'launches', recordId: 'L1' },
    });
    expect(schemaConflictError('launches', 'no', 'links').details).toEqual({ table: 'launches', column: 'links' });
    expect(schemaConflictError('launches', 'no').details).toEqual({ table: 'launches' });
  });

  it('serializes to JSON with category and details', () => {
    const json = missingIdentifierError('launches').toJSON();

    expect(json).toMatchObject({
      name: 'LoaderError',
      category: 'MISSING_IDENTIFIER',
      message: 'Record for "launches" has no usable "id"',
      details: { table: 'launches' },
    });
  });

  it('has a recovery hint for every category', () => {
    expect(getRecoveryHint('NESTING_TOO_DEEP')).toContain('JSONLOADER_MAX_DEPTH');
    expect(getRecoveryHint('FETCH_ERROR')).toContain('JSONLOADER_API_BASE_URL');
  });
});

describe('validateInput', () => {
  it('returns the parsed value', () => {
    expect(validateInput(JsonObjectSchema, { id: 'L1', n: [1, { a: null }] })).toEqual({
      id: 'L1',
      n: [1, { a: null }],
    });
  });

  it('throws ValidationError with path-prefixed messages', () => {
    expect(() => validateInput(JsonObjectSchema, { id: 'L1', bad: undefined })).toThrow(ValidationError);
    expect(() => validateInput(JsonObjectSchema, 'x')).toThrow('Expected object, received string');
    expect(() => validateInput(JsonObjectSchema, { id: 'L1', n: [1, { x: Number.NaN }] })).toThrow(
      'n.1.x: Expected a finite number, received NaN'
    );
  });

  it('accepts records nested far deeper than the call stack allows', () => {
    let value: unknown = 1;
    for (let i = 0; i < 20000; i++) {
      value = [value];
    }

    expect(validateInput(JsonObjectSchema, { id: 'L1', n: value })).toMatchObject({ id: 'L1' });
  });
});
