/**
 * Unit Tests for load report formatting
 */

import { describe, it, expect } from 'vitest';
import { createEmptyReport, formatReport } from '../../../src/models/report.js';

describe('formatReport', () => {
  it('renders a clean run as a single line', () => {
    const report = { ...createEmptyReport('launches'), total: 2, processed: 2, childRowsWritten: 5 };

    expect(formatReport(report)).toBe(
      'launches: 2 processed, 0 skipped, 0 failed (of 2); 5 child rows written, 0 child rows failed; 0 schema changes'
    );
  });

  it('adds one line per failure with column and id or position', () => {
    const report = {
      ...createEmptyReport('launches'),
      total: 3,
      processed: 1,
      skipped: 1,
      failed: 1,
      failures: [
        {
          table: 'launches',
          recordId: null,
          index: 1,
          category: 'MISSING_IDENTIFIER' as const,
          message: 'Record for "launches" has no usable "id"',
        },
        {
          table: 'launches',
          recordId: 'L3',
          index: 2,
          column: 'bad',
          category: 'SCHEMA_CONFLICT' as const,
          message: 'simulated',
        },
      ],
      schemaChanges: [{ kind: 'create_table' as const, table: 'launches' }],
    };

    expect(formatReport(report).split('\n')).toEqual([
      'launches: 1 processed, 1 skipped, 1 failed (of 3); 0 child rows written, 0 child rows failed; 1 schema changes',
      '  - [MISSING_IDENTIFIER] launches #1: Record for "launches" has no usable "id"',
      '  - [SCHEMA_CONFLICT] launches.bad L3: simulated',
    ]);
  });
});
