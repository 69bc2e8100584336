/**
 * NestedTableRouter - child tables for nested objects and arrays
 *
 * Each nested field of a row in table T is stored in T_{field}, one row per
 * object (or per array element), linked back through a T_id column. Nesting is
 * walked with an explicit stack and capped at maxDepth.
 *
 * Row ids: an object element with its own usable `id` keeps it; every other
 * row gets a UUIDv5 derived from (parent table, parent id, field, index), so
 * loading the same data again updates the same rows.
 *
 * @module loader/nested-router
 */

import { v5 as uuidv5 } from 'uuid';
import { LoaderError, nestingTooDeepError } from '../../errors.js';
import { exceedsDepth, isJsonObject, type JsonValue } from '../../models/record.js';
import type { FlatFields, NestedFragment, ParentLink } from '../../models/schema.js';
import { toFieldValue } from '../../models/value.js';
import type { SchemaCatalog } from '../schema/catalog.js';
import { childTableName, parentColumnName } from '../schema/identifiers.js';
import type { SchemaMigrator } from '../schema/migrator.js';
import { DEFAULT_MAX_DEPTH, flattenFields, optionalRecordId, type ExtractedFragment } from './flattener.js';
import type { UpsertEngine } from './upsert-engine.js';

/**
 * Namespace for derived child-row ids
 */
export const CHILD_ROW_NAMESPACE = '8f1d2c3b-5a6e-4f70-9b81-2c3d4e5f6a7b';

/** Column holding an array element's position */
export const ITEM_INDEX_COLUMN = 'item_index';

/** Column holding a scalar array element */
export const VALUE_COLUMN = 'value';

export interface RouterOptions {
  maxDepth: number;
  quiet: boolean;
}

export interface RouteFailure {
  table: string;
  recordId: string | null;
  error: LoaderError;
}

export interface RouteOutcome {
  rowsWritten: number;
  failures: RouteFailure[];
}

/**
 * Deterministic id of a child row without its own identifier
 */
export function deriveChildId(
  parentTable: string,
  parentId: string,
  field: string,
  index?: number
): string {
  const key = index === undefined
    ? `${parentTable}/${parentId}/${field}`
    : `${parentTable}/${parentId}/${field}/${index}`;
  return uuidv5(key, CHILD_ROW_NAMESPACE);
}

interface ChildRow {
  id: string;
  fields: FlatFields;
  fragments: ExtractedFragment[];
}

export class NestedTableRouter {
  constructor(
    private readonly catalog: SchemaCatalog,
    private readonly migrator: SchemaMigrator,
    private readonly engine: UpsertEngine,
    private readonly options: RouterOptions = { maxDepth: DEFAULT_MAX_DEPTH, quiet: false }
  ) {}

  /**
   * Route every fragment extracted from one parent row
   */
  routeAll(
    parentTable: string,
    parentId: string,
    fragments: readonly ExtractedFragment[],
    depth = 1
  ): RouteOutcome {
    const outcome: RouteOutcome = { rowsWritten: 0, failures: [] };
    for (const fragment of fragments) {
      const result = this.route({ ...fragment, parentTable, parentId, depth });
      outcome.rowsWritten += result.rowsWritten;
      outcome.failures.push(...result.failures);
    }
    return outcome;
  }

  /**
   * Store one fragment and everything nested below it.
   * Failures stay with the row that raised them; committed parents are kept.
   */
  route(fragment: NestedFragment): RouteOutcome {
    const outcome: RouteOutcome = { rowsWritten: 0, failures: [] };
    const stack: NestedFragment[] = [fragment];

    let current = stack.pop();
    while (current !== undefined) {
      const table = childTableName(current.parentTable, current.field);

      if (current.depth > this.options.maxDepth) {
        console.error(`[Router] Skipping ${table}: depth ${current.depth} exceeds ${this.options.maxDepth}`);
        outcome.failures.push({
          table,
          recordId: current.parentId,
          error: nestingTooDeepError(table, current.depth, this.options.maxDepth),
        });
        current = stack.pop();
        continue;
      }

      const children = this.writeFragment(table, current, outcome);
      // Reverse so the first nested field is processed first
      for (let i = children.length - 1; i >= 0; i--) {
        const child = children[i];
        if (child) stack.push(child);
      }
      current = stack.pop();
    }

    return outcome;
  }

  /**
   * Write the rows of one fragment and return the fragments nested in them
   */
  private writeFragment(table: string, fragment: NestedFragment, outcome: RouteOutcome): NestedFragment[] {
    if (Array.isArray(fragment.value) && fragment.value.length === 0) {
      return [];
    }

    const parent: ParentLink = {
      table: fragment.parentTable,
      column: parentColumnName(fragment.parentTable),
      idType: this.catalog.idType(fragment.parentTable),
    };

    try {
      this.migrator.ensureTable(table, parent.idType, parent);
    } catch (error) {
      outcome.failures.push({ table, recordId: fragment.parentId, error: this.recordScoped(error) });
      return [];
    }

    const elements: Array<{ value: JsonValue; index?: number }> = Array.isArray(fragment.value)
      ? fragment.value.map((value, index) => ({ value, index }))
      : [{ value: fragment.value }];

    const nested: NestedFragment[] = [];
    for (const element of elements) {
      let rowId: string | null = null;
      try {
        const row = this.buildRow(fragment, element.value, element.index);
        rowId = row.id;
        row.fields.set(parent.column, { kind: 'text', value: fragment.parentId });
        if (element.index !== undefined) {
          row.fields.set(ITEM_INDEX_COLUMN, { kind: 'int', value: element.index });
        }
        this.engine.writeRow(table, row.id, row.fields);
        outcome.rowsWritten++;

        for (const child of row.fragments) {
          nested.push({
            field: child.field,
            value: child.value,
            parentTable: table,
            parentId: row.id,
            depth: fragment.depth + 1,
          });
        }
      } catch (error) {
        outcome.failures.push({ table, recordId: rowId, error: this.recordScoped(error) });
      }
    }

    if (!this.options.quiet) {
      console.error(`[Router] ${table}: ${elements.length} row(s) for parent ${fragment.parentId}`);
    }
    return nested;
  }

  private buildRow(fragment: NestedFragment, value: JsonValue, index: number | undefined): ChildRow {
    const derivedId = deriveChildId(fragment.parentTable, fragment.parentId, fragment.field, index);

    if (isJsonObject(value)) {
      const flat = flattenFields(value);
      return {
        id: optionalRecordId(flat.rawId) ?? derivedId,
        fields: flat.fields,
        fragments: flat.fragments,
      };
    }

    // An array inside an array is stored as a JSON document one level down
    const { maxDepth } = this.options;
    if (Array.isArray(value) && exceedsDepth(value, maxDepth - fragment.depth)) {
      throw nestingTooDeepError(childTableName(fragment.parentTable, fragment.field), maxDepth + 1, maxDepth);
    }

    const fields: FlatFields = new Map();
    fields.set(VALUE_COLUMN, toFieldValue(value));
    return { id: derivedId, fields, fragments: [] };
  }

  private recordScoped(error: unknown): LoaderError {
    const loaderError = LoaderError.fromUnknown(error, 'WRITE_ERROR');
    if (loaderError.category === 'FATAL_CONNECTION') {
      throw loaderError;
    }
    return loaderError;
  }
}
