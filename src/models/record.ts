/**
 * JSON record types for the loader
 *
 * Records arrive from a fetch collaborator as parsed JSON. The zod schemas and
 * guards here are the single place where untyped input becomes a typed
 * JsonObject.
 */

import { z } from 'zod';

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonPath = Array<string | number>;

export interface JsonProblem {
  path: JsonPath;
  message: string;
}

function describeValue(value: unknown): string {
  if (typeof value === 'number') return String(value);
  if (typeof value === 'object' && value !== null) return 'a non-plain object';
  return typeof value;
}

function isPlainObject(value: object): boolean {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

interface WalkNode {
  value: unknown;
  key: string | number | null;
  parent: WalkNode | null;
}

function pathOf(node: WalkNode): JsonPath {
  const path: JsonPath = [];
  for (let n: WalkNode | null = node; n !== null; n = n.parent) {
    if (n.key !== null) path.push(n.key);
  }
  return path.reverse();
}

/**
 * Find the first value that is not JSON (undefined, functions, NaN/Infinity,
 * class instances, ...). Walks with an explicit stack, so nesting depth is
 * bounded only by memory.
 */
export function findNonJsonValue(root: unknown): JsonProblem | null {
  const stack: WalkNode[] = [{ value: root, key: null, parent: null }];
  const seen = new Set<object>();

  for (let node = stack.pop(); node !== undefined; node = stack.pop()) {
    const { value } = node;

    if (value === null || typeof value === 'string' || typeof value === 'boolean') {
      continue;
    }
    if (typeof value === 'number') {
      if (Number.isFinite(value)) continue;
      return { path: pathOf(node), message: `Expected a finite number, received ${describeValue(value)}` };
    }
    if (typeof value !== 'object' || (!Array.isArray(value) && !isPlainObject(value))) {
      return { path: pathOf(node), message: `Expected a JSON value, received ${describeValue(value)}` };
    }
    if (seen.has(value)) {
      return { path: pathOf(node), message: 'Value is referenced more than once' };
    }
    seen.add(value);

    const entries: Array<[string | number, unknown]> = Array.isArray(value)
      ? value.map((item: unknown, index): [number, unknown] => [index, item])
      : Object.entries(value);
    for (let i = entries.length - 1; i >= 0; i--) {
      const entry = entries[i];
      if (entry) stack.push({ value: entry[1], key: entry[0], parent: node });
    }
  }
  return null;
}

export function isJsonValue(value: unknown): value is JsonValue {
  return findNonJsonValue(value) === null;
}

/**
 * A record must be a JSON object at the top level. The shape check is zod's;
 * the nested values are checked iteratively instead of through a recursive
 * schema, which would overflow the call stack on very deep input.
 */
export const JsonObjectSchema = z
  .record(z.string(), z.unknown())
  .superRefine((record, ctx): record is JsonObject => {
    const problem = findNonJsonValue(record);
    if (problem === null) {
      return true;
    }
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: problem.path, message: problem.message });
    return false;
  });

/**
 * Whether a JSON value has a container nested deeper than `limit` levels.
 * A top-level object or array is level 1.
 */
export function exceedsDepth(value: JsonValue, limit: number): boolean {
  const stack: Array<{ value: JsonValue; depth: number }> = [{ value, depth: 1 }];

  let current = stack.pop();
  while (current !== undefined) {
    const node = current.value;
    if (node !== null && typeof node === 'object') {
      if (current.depth > limit) {
        return true;
      }
      const children = Array.isArray(node) ? node : Object.values(node);
      for (const child of children) {
        stack.push({ value: child, depth: current.depth + 1 });
      }
    }
    current = stack.pop();
  }
  return false;
}

/**
 * Accepted identifier values: non-empty string or integer
 */
export const RecordIdSchema = z.union([
  z.string().min(1, 'id must not be empty'),
  z.number().int('id must be an integer'),
]);

export function isJsonObject(value: JsonValue): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
