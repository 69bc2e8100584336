/**
 * Table and column identifiers
 *
 * JSON keys are folded to lowercase and reduced to [a-z0-9_] so every name
 * is a plain SQLite identifier. Names are still double-quoted in SQL, which
 * covers reserved words such as "window" or "order".
 *
 * @module schema/identifiers
 */

const INVALID_CHARS = /[^a-z0-9_]/g;
const VALID_IDENTIFIER = /^[a-z_][a-z0-9_]*$/;

/**
 * Error for a name that cannot be made into an identifier
 */
export class IdentifierError extends Error {
  constructor(
    message: string,
    public readonly identifier: string
  ) {
    super(message);
    this.name = 'IdentifierError';
  }
}

/**
 * Fold a JSON key or table name into a column-safe identifier
 *
 * @example
 * toIdentifier('Date UTC')   // 'date_utc'
 * toIdentifier('2ndStage')   // '_2ndstage'
 */
export function toIdentifier(name: string): string {
  const folded = name.trim().toLowerCase().replace(INVALID_CHARS, '_');
  if (folded.length === 0) {
    throw new IdentifierError(`Cannot derive an identifier from "${name}"`, name);
  }
  return /^[0-9]/.test(folded) ? `_${folded}` : folded;
}

/**
 * Check that a name is already a folded identifier
 */
export function isValidIdentifier(name: string): boolean {
  return VALID_IDENTIFIER.test(name);
}

/**
 * Throw unless `name` is a folded identifier
 */
export function assertIdentifier(name: string): string {
  if (!isValidIdentifier(name)) {
    throw new IdentifierError(
      `Invalid identifier "${name}". Only lowercase letters, digits and underscores are allowed.`,
      name
    );
  }
  return name;
}

/**
 * Quote an identifier for SQL
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/**
 * Name of the child table holding `field` of rows in `parentTable`
 */
export function childTableName(parentTable: string, field: string): string {
  return `${parentTable}_${field}`;
}

/**
 * Name of the column in a child table that references the parent row
 */
export function parentColumnName(parentTable: string): string {
  return `${parentTable}_id`;
}
