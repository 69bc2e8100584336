/**
 * On-disk JSON snapshots of fetched datasets
 *
 * @module source/snapshot
 */

import fs from 'fs';
import path from 'path';

/**
 * Write records to `{dir}/{name}.json`, creating `dir` if needed.
 *
 * @returns Absolute path of the written file
 */
export function saveSnapshot(records: readonly unknown[], dir: string, name: string): string {
  const filePath = path.resolve(dir, `${name}.json`);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(records, null, 2) + '\n', 'utf-8');
  console.error(`[Snapshot] Saved ${records.length} records to ${filePath}`);
  return filePath;
}

/**
 * Read records back from a snapshot written by saveSnapshot
 */
export function readSnapshot(filePath: string): unknown[] {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  return Array.isArray(parsed) ? parsed : [parsed];
}
