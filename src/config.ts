/**
 * Loader configuration
 *
 * Settings come from environment variables (optionally loaded from .env by
 * the CLI) and a datasets file listing what to load. Both are validated with
 * zod; anything invalid is a CONFIGURATION_ERROR before any data is touched.
 *
 * @module config
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { configurationError } from './errors.js';
import { DEFAULT_MAX_DEPTH } from './services/loader/flattener.js';
import type { LoaderOptions } from './services/loader/loader.js';
import { formatIssues } from './utils/validation.js';

// ═══════════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════════

const booleanFlag = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform((value) => value === 'true' || value === '1' || value === 'yes');

const EnvSchema = z.object({
  JSONLOADER_DB_PATH: z.string().min(1).default('data/loader.db'),
  JSONLOADER_API_BASE_URL: z.string().url('JSONLOADER_API_BASE_URL must be a URL').optional(),
  JSONLOADER_DATASETS_FILE: z.string().min(1).default('datasets.json'),
  JSONLOADER_SNAPSHOT_DIR: z.string().min(1).default('data'),
  JSONLOADER_MAX_DEPTH: z.coerce.number().int().min(1).max(256).default(DEFAULT_MAX_DEPTH),
  JSONLOADER_NESTED_STRATEGY: z.enum(['split', 'inline']).default('split'),
  JSONLOADER_LEGACY_BOOLEAN_STRINGS: booleanFlag.default('true'),
  JSONLOADER_QUIET: booleanFlag.default('false'),
});

export interface LoaderConfig {
  dbPath: string;
  apiBaseUrl?: string;
  datasetsFile: string;
  snapshotDir: string;
  loader: LoaderOptions;
}

/**
 * Build configuration from environment variables
 *
 * @throws LoaderError CONFIGURATION_ERROR
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoaderConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw configurationError(`Invalid environment: ${formatIssues(result.error)}`);
  }
  const e = result.data;
  return {
    dbPath: e.JSONLOADER_DB_PATH,
    ...(e.JSONLOADER_API_BASE_URL !== undefined && { apiBaseUrl: e.JSONLOADER_API_BASE_URL }),
    datasetsFile: e.JSONLOADER_DATASETS_FILE,
    snapshotDir: e.JSONLOADER_SNAPSHOT_DIR,
    loader: {
      maxDepth: e.JSONLOADER_MAX_DEPTH,
      nestedStrategy: e.JSONLOADER_NESTED_STRATEGY,
      legacyBooleanStrings: e.JSONLOADER_LEGACY_BOOLEAN_STRINGS,
      quiet: e.JSONLOADER_QUIET,
    },
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// DATASETS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One dataset: where its records come from and which root table they go to.
 * `source` is a path under the API base URL (or a full URL); `file` is a local
 * JSON file. Exactly one of them is required.
 */
export const DatasetSchema = z
  .object({
    table: z.string().min(1, 'table is required'),
    source: z.string().min(1).optional(),
    file: z.string().min(1).optional(),
    snapshot: z.boolean().default(true),
  })
  .refine((d) => (d.source === undefined) !== (d.file === undefined), {
    message: 'exactly one of "source" or "file" is required',
  });

export type Dataset = z.output<typeof DatasetSchema>;

export const DatasetsSchema = z.array(DatasetSchema).min(1, 'at least one dataset is required');

/**
 * Read and validate the datasets file. Relative `file` entries are resolved
 * against the datasets file's directory.
 *
 * @throws LoaderError CONFIGURATION_ERROR
 */
export function loadDatasets(filePath: string): Dataset[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw configurationError(
      `Cannot read datasets file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { filePath }
    );
  }

  const result = DatasetsSchema.safeParse(raw);
  if (!result.success) {
    throw configurationError(`Invalid datasets file ${filePath}: ${formatIssues(result.error)}`, { filePath });
  }

  const baseDir = path.dirname(path.resolve(filePath));
  return result.data.map((dataset) =>
    dataset.file === undefined ? dataset : { ...dataset, file: path.resolve(baseDir, dataset.file) }
  );
}
