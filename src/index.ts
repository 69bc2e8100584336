/**
 * json-table-loader
 *
 * Loads JSON records into SQLite tables whose schema grows with the data:
 * new keys become columns, nested objects and arrays become child tables.
 *
 * @example
 * const conn = new SqliteConnection(openDatabase('data/loader.db'));
 * const report = new JsonTableLoader(conn).loadRecords('launches', records);
 * console.log(formatReport(report));
 *
 * @module index
 */

export * from './models/index.js';
export * from './errors.js';

export { loadConfig, loadDatasets, DatasetSchema, DatasetsSchema } from './config.js';
export type { Dataset, LoaderConfig } from './config.js';

export * from './services/storage/index.js';

export { SchemaCatalog } from './services/schema/catalog.js';
export { SchemaMigrator } from './services/schema/migrator.js';
export type { ColumnFailure, EnsureColumnsResult, MigratorOptions } from './services/schema/migrator.js';
export { inferColumnType, DEFAULT_INFERENCE_OPTIONS } from './services/schema/type-inferencer.js';
export type { InferenceOptions } from './services/schema/type-inferencer.js';
export {
  IdentifierError,
  toIdentifier,
  quoteIdentifier,
  childTableName,
  parentColumnName,
} from './services/schema/identifiers.js';

export { flatten, flattenFields, DEFAULT_MAX_DEPTH } from './services/loader/flattener.js';
export type { NestedStrategy, ExtractedFragment, FlattenedRecord } from './services/loader/flattener.js';
export { UpsertEngine, buildUpsertSql } from './services/loader/upsert-engine.js';
export type { UpsertOptions, UpsertResult } from './services/loader/upsert-engine.js';
export {
  NestedTableRouter,
  deriveChildId,
  CHILD_ROW_NAMESPACE,
  ITEM_INDEX_COLUMN,
  VALUE_COLUMN,
} from './services/loader/nested-router.js';
export type { RouteFailure, RouteOutcome, RouterOptions } from './services/loader/nested-router.js';
export { JsonTableLoader, DEFAULT_LOADER_OPTIONS } from './services/loader/loader.js';
export type { LoaderOptions } from './services/loader/loader.js';

export { fetchRecords, buildSourceUrl, HttpStatusError } from './services/source/fetcher.js';
export type { FetchOptions } from './services/source/fetcher.js';
export { saveSnapshot, readSnapshot } from './services/source/snapshot.js';

export { ValidationError, validateInput } from './utils/validation.js';
export { withRetry, calculateBackoffDelay, DEFAULT_BACKOFF } from './utils/backoff.js';
export type { BackoffConfig } from './utils/backoff.js';
