/**
 * JsonTableLoader - batch driver
 *
 * Loads a sequence of JSON records into a root table, one record at a time:
 * flatten, reconcile, upsert, then route nested fragments into child tables.
 * Every record runs inside its own error boundary; only a lost storage
 * connection stops the batch.
 *
 * @module loader/loader
 */

import { configurationError, LoaderError } from '../../errors.js';
import { JsonObjectSchema } from '../../models/record.js';
import { createEmptyReport, type LoadReport, type RecordFailure } from '../../models/report.js';
import { ColumnType, DECLARED_TYPES } from '../../models/schema.js';
import { validateInput } from '../../utils/validation.js';
import { SchemaCatalog } from '../schema/catalog.js';
import { IdentifierError, toIdentifier } from '../schema/identifiers.js';
import { SchemaMigrator } from '../schema/migrator.js';
import { DEFAULT_INFERENCE_OPTIONS } from '../schema/type-inferencer.js';
import type { StorageConnection } from '../storage/types.js';
import { DEFAULT_MAX_DEPTH, type NestedStrategy } from './flattener.js';
import { NestedTableRouter, type RouteFailure } from './nested-router.js';
import { UpsertEngine } from './upsert-engine.js';

export interface LoaderOptions {
  /** Deepest child table level that is stored (root children are level 1) */
  maxDepth: number;
  nestedStrategy: NestedStrategy;
  /** Infer "true"/"false" strings as BOOLEAN */
  legacyBooleanStrings: boolean;
  /** Suppress per-row info logging; errors are always logged */
  quiet: boolean;
}

export const DEFAULT_LOADER_OPTIONS: LoaderOptions = {
  maxDepth: DEFAULT_MAX_DEPTH,
  nestedStrategy: 'split',
  legacyBooleanStrings: DEFAULT_INFERENCE_OPTIONS.legacyBooleanStrings,
  quiet: false,
};

export class JsonTableLoader {
  readonly options: LoaderOptions;
  readonly catalog: SchemaCatalog;
  readonly migrator: SchemaMigrator;
  readonly engine: UpsertEngine;
  readonly router: NestedTableRouter;

  constructor(
    readonly conn: StorageConnection,
    options: Partial<LoaderOptions> = {}
  ) {
    this.options = { ...DEFAULT_LOADER_OPTIONS, ...options };
    const { quiet, maxDepth, nestedStrategy, legacyBooleanStrings } = this.options;

    this.catalog = new SchemaCatalog(conn, { legacyBooleanStrings });
    this.migrator = new SchemaMigrator(conn, { quiet });
    this.engine = new UpsertEngine(conn, this.catalog, this.migrator, { nestedStrategy, maxDepth, quiet });
    this.router = new NestedTableRouter(this.catalog, this.migrator, this.engine, { maxDepth, quiet });
  }

  /**
   * Load records into `table` and report what happened to each one.
   *
   * @throws LoaderError CONFIGURATION_ERROR when the table name is unusable
   * @throws LoaderError FATAL_CONNECTION when storage is lost mid-run
   */
  loadRecords(table: string, records: Iterable<unknown>): LoadReport {
    const root = this.rootTableName(table);
    const report = createEmptyReport(root);
    const changesBefore = this.migrator.getAppliedChanges().length;

    this.migrator.ensureTable(root, DECLARED_TYPES[ColumnType.TEXT]);

    let index = 0;
    for (const record of records) {
      this.loadOne(root, record, index, report);
      index++;
    }

    report.total = index;
    report.schemaChanges = this.migrator.getAppliedChanges().slice(changesBefore);

    console.error(
      `[Loader] ${root}: ${report.processed} processed, ${report.skipped} skipped, ${report.failed} failed`
    );
    return report;
  }

  private loadOne(root: string, input: unknown, index: number, report: LoadReport): void {
    try {
      const record = validateInput(JsonObjectSchema, input);
      const result = this.engine.upsert(root, record);

      if (!result.ok) {
        if (result.error.category === 'MISSING_IDENTIFIER') {
          console.error(`[Loader] Skipping record #${index} in ${root} without 'id'`);
          report.skipped++;
        } else {
          report.failed++;
        }
        report.failures.push(toFailure(root, result.id, index, result.error));
        return;
      }

      report.processed++;
      const outcome = this.router.routeAll(root, result.id, result.fragments);
      report.childRowsWritten += outcome.rowsWritten;
      report.childRowsFailed += outcome.failures.length;
      for (const failure of outcome.failures) {
        report.failures.push(fromRouteFailure(failure, index));
      }
    } catch (error) {
      const loaderError = LoaderError.fromUnknown(error);
      if (loaderError.category === 'FATAL_CONNECTION') {
        throw loaderError;
      }
      if (loaderError.isRecordScoped()) {
        console.error(`[Loader] Record #${index} in ${root} failed: ${loaderError.message}`);
      } else {
        console.error(`[Loader] Record #${index} in ${root} failed unexpectedly:`, loaderError.toJSON());
      }
      report.failed++;
      report.failures.push(toFailure(root, null, index, loaderError));
    }
  }

  private rootTableName(table: string): string {
    try {
      return toIdentifier(table);
    } catch (error) {
      if (error instanceof IdentifierError) {
        throw configurationError(error.message, { table });
      }
      throw error;
    }
  }
}

function toFailure(table: string, recordId: string | null, index: number, error: LoaderError): RecordFailure {
  const column = error.details?.column;
  return {
    table,
    recordId,
    index,
    ...(typeof column === 'string' && { column }),
    category: error.category,
    message: error.message,
  };
}

function fromRouteFailure(failure: RouteFailure, index: number): RecordFailure {
  return toFailure(failure.table, failure.recordId, index, failure.error);
}
