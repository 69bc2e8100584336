/**
 * Storage Service Module
 *
 * SQLite access behind the StorageConnection capability, plus the explicit
 * maintenance operations.
 */

export type { Row, StorageConnection } from './types.js';

export { SqliteConnection, isFatalSqliteError } from './connection.js';

export { DATABASE_PRAGMAS, configurePragmas, openDatabase } from './database.js';

export {
  dropColumn,
  splitJsonColumns,
  type ColumnSplitResult,
  type SplitReport,
} from './maintenance.js';
