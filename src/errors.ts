/**
 * Loader Error Handling
 *
 * Every failure the loader can report carries a category. Record-level
 * categories are caught at the record boundary and end up in the LoadReport;
 * FATAL_CONNECTION and CONFIGURATION_ERROR propagate and abort the run.
 *
 * @module errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error categories for loader failures
 */
export type ErrorCategory =
  // Record validation
  | 'MISSING_IDENTIFIER'
  | 'INVALID_RECORD'

  // Schema evolution
  | 'SCHEMA_CONFLICT'
  | 'NESTING_TOO_DEEP'

  // Data writes
  | 'WRITE_ERROR'

  // Storage connection
  | 'FATAL_CONNECTION'

  // Source data
  | 'FETCH_ERROR'

  // Configuration
  | 'CONFIGURATION_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

/**
 * Categories that are scoped to one record and never abort a batch
 */
const RECORD_SCOPED_CATEGORIES = new Set<ErrorCategory>([
  'MISSING_IDENTIFIER',
  'INVALID_RECORD',
  'SCHEMA_CONFLICT',
  'NESTING_TOO_DEEP',
  'WRITE_ERROR',
]);

/**
 * Map error class names thrown by lower layers to loader categories
 */
const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'INVALID_RECORD',
  IdentifierError: 'INVALID_RECORD',
  SqliteError: 'WRITE_ERROR',
};

// ═══════════════════════════════════════════════════════════════════════════════
// LOADER ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * LoaderError - Structured error class for all loader failures
 *
 * `details` carries the debugging context (table, record id, column).
 */
export class LoaderError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;
  public readonly cause?: unknown;

  constructor(
    category: ErrorCategory,
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message);
    this.name = 'LoaderError';
    this.category = category;
    this.details = details;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, LoaderError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(error: unknown, defaultCategory: ErrorCategory = 'INTERNAL_ERROR'): LoaderError {
    if (error instanceof LoaderError) {
      return error;
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      const code = readStringProperty(error, 'code');
      return new LoaderError(
        category,
        error.message,
        {
          originalName: error.name,
          ...(code && { errorCode: code }),
        },
        error
      );
    }

    return new LoaderError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  /**
   * Whether this error is confined to the record that raised it
   */
  isRecordScoped(): boolean {
    return RECORD_SCOPED_CATEGORIES.has(this.category);
  }

  /**
   * Convert to JSON for logging/serialization
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
      stack: this.stack,
    };
  }
}

function readStringProperty(error: Error, key: string): string | undefined {
  const value: unknown = Reflect.get(error, key);
  return typeof value === 'string' ? value : undefined;
}

// ═══════════════════════════════════════════════════════════════════════════════
// RECOVERY HINTS
// ═══════════════════════════════════════════════════════════════════════════════

const RECOVERY_HINTS: Record<ErrorCategory, string> = {
  MISSING_IDENTIFIER: 'Every record needs a non-empty "id" (string or integer)',
  INVALID_RECORD: 'Check that the record is a JSON object and its keys do not collide after lower-casing',
  SCHEMA_CONFLICT: 'Inspect the table with PRAGMA table_info; another writer may have changed it',
  NESTING_TOO_DEEP: 'Raise JSONLOADER_MAX_DEPTH or use the inline nested strategy for this dataset',
  WRITE_ERROR: 'Compare the record values with the live column types and constraints',
  FATAL_CONNECTION: 'Check that the database file is reachable and not corrupted, then rerun',
  FETCH_ERROR: 'Check JSONLOADER_API_BASE_URL and the dataset source path',
  CONFIGURATION_ERROR: 'Check environment variables and the datasets file',
  INTERNAL_ERROR: 'Rerun with JSONLOADER_QUIET=false to see per-record diagnostics',
};

/**
 * Get recovery hint for an error category.
 */
export function getRecoveryHint(category: ErrorCategory): string {
  return RECOVERY_HINTS[category];
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function missingIdentifierError(table: string, details?: Record<string, unknown>): LoaderError {
  return new LoaderError('MISSING_IDENTIFIER', `Record for "${table}" has no usable "id"`, {
    table,
    ...details,
  });
}

export function invalidRecordError(message: string, details?: Record<string, unknown>): LoaderError {
  return new LoaderError('INVALID_RECORD', message, details);
}

/**
 * Create schema conflict error for a failed CREATE TABLE / ADD COLUMN
 */
export function schemaConflictError(
  table: string,
  message: string,
  column?: string,
  cause?: unknown
): LoaderError {
  return new LoaderError('SCHEMA_CONFLICT', message, { table, ...(column && { column }) }, cause);
}

export function writeError(table: string, recordId: string, cause: unknown): LoaderError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new LoaderError(
    'WRITE_ERROR',
    `Failed to upsert "${recordId}" into "${table}": ${reason}`,
    { table, recordId },
    cause
  );
}

export function nestingTooDeepError(
  table: string,
  depth: number,
  maxDepth: number,
  column?: string
): LoaderError {
  const location = column === undefined ? table : `${table}.${column}`;
  return new LoaderError(
    'NESTING_TOO_DEEP',
    `Nested value for "${location}" is at depth ${depth}, limit is ${maxDepth}`,
    { table, depth, maxDepth, ...(column && { column }) }
  );
}

export function fatalConnectionError(message: string, cause?: unknown): LoaderError {
  return new LoaderError('FATAL_CONNECTION', message, undefined, cause);
}

export function fetchError(url: string, message: string, cause?: unknown): LoaderError {
  return new LoaderError('FETCH_ERROR', message, { url }, cause);
}

/**
 * Create configuration error for invalid environment variables or dataset files
 */
export function configurationError(message: string, details?: Record<string, unknown>): LoaderError {
  return new LoaderError('CONFIGURATION_ERROR', message, details);
}
