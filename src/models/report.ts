/**
 * Load report - end-of-run accounting for one dataset
 */

import type { ErrorCategory } from '../errors.js';
import type { SchemaChange } from './schema.js';

/**
 * One record (or child row) that was not written
 */
export interface RecordFailure {
  table: string;
  /** Record id, or null when the record had none */
  recordId: string | null;
  /** Zero-based position of the root record in the batch */
  index: number;
  column?: string;
  category: ErrorCategory;
  message: string;
}

export interface LoadReport {
  table: string;
  /** Root records received */
  total: number;
  /** Root records written */
  processed: number;
  /** Root records without an identifier */
  skipped: number;
  /** Root records that failed for any other reason */
  failed: number;
  /** Child-table rows written across all nesting levels */
  childRowsWritten: number;
  /** Child rows that failed; their root record still counts as processed */
  childRowsFailed: number;
  failures: RecordFailure[];
  /** CREATE TABLE / ADD COLUMN applied during the run */
  schemaChanges: SchemaChange[];
}

export function createEmptyReport(table: string): LoadReport {
  return {
    table,
    total: 0,
    processed: 0,
    skipped: 0,
    failed: 0,
    childRowsWritten: 0,
    childRowsFailed: 0,
    failures: [],
    schemaChanges: [],
  };
}

/**
 * Render a report as the end-of-run summary: one line of counts, then one
 * line per failure.
 */
export function formatReport(report: LoadReport): string {
  const lines = [
    `${report.table}: ${report.processed} processed, ${report.skipped} skipped, ` +
      `${report.failed} failed (of ${report.total}); ` +
      `${report.childRowsWritten} child rows written, ${report.childRowsFailed} child rows failed; ` +
      `${report.schemaChanges.length} schema changes`,
  ];
  for (const failure of report.failures) {
    const where = failure.column ? `${failure.table}.${failure.column}` : failure.table;
    const id = failure.recordId ?? `#${failure.index}`;
    lines.push(`  - [${failure.category}] ${where} ${id}: ${failure.message}`);
  }
  return lines.join('\n');
}
