/**
 * json-table-loader command line
 *
 * stdout carries the reports; every diagnostic goes to stderr.
 *
 * Usage:
 *   json-table-loader [load] [--datasets datasets.json] [--only <table>]
 *   json-table-loader tables
 *   json-table-loader split <table>
 *   json-table-loader drop-column <table> <column>
 *
 * @module cli
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import { loadConfig, loadDatasets, type Dataset, type LoaderConfig } from './config.js';
import { configurationError, fetchError, getRecoveryHint, LoaderError } from './errors.js';
import { formatReport } from './models/report.js';
import { JsonTableLoader } from './services/loader/loader.js';
import { buildSourceUrl, fetchRecords } from './services/source/fetcher.js';
import { readSnapshot, saveSnapshot } from './services/source/snapshot.js';
import { SqliteConnection } from './services/storage/connection.js';
import { openDatabase } from './services/storage/database.js';
import { dropColumn, splitJsonColumns } from './services/storage/maintenance.js';

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_CONFIGURATION = 2;

type Output = (line: string) => void;

/**
 * Load .env from the first candidate that exists:
 * 1. JSONLOADER_ENV_FILE (explicit override)
 * 2. CWD/.env
 */
export function loadEnvironment(): void {
  const envCandidates = [process.env.JSONLOADER_ENV_FILE, path.resolve(process.cwd(), '.env')].filter(
    (p): p is string => typeof p === 'string' && p.length > 0
  );

  for (const envPath of envCandidates) {
    if (fs.existsSync(envPath)) {
      dotenv.config({ path: envPath, quiet: true });
      break;
    }
  }
}

/**
 * Read one dataset's records from its URL or local file
 *
 * @throws LoaderError FETCH_ERROR or CONFIGURATION_ERROR
 */
export async function readDataset(dataset: Dataset, config: LoaderConfig): Promise<unknown[]> {
  if (dataset.file !== undefined) {
    try {
      return readSnapshot(dataset.file);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw fetchError(dataset.file, `Failed to read ${dataset.file}: ${reason}`, error);
    }
  }

  const source = dataset.source ?? '';
  if (config.apiBaseUrl === undefined && !/^https?:\/\//i.test(source)) {
    throw configurationError(
      `Dataset "${dataset.table}" has a relative source but JSONLOADER_API_BASE_URL is not set`,
      { table: dataset.table }
    );
  }
  return fetchRecords(buildSourceUrl(config.apiBaseUrl ?? '', source));
}

/**
 * Fetch, snapshot and load every dataset in order.
 *
 * A dataset that cannot be fetched, snapshotted or loaded is reported and
 * skipped; only a lost storage connection aborts the run.
 *
 * @returns true when every dataset and every record loaded cleanly
 */
export async function runLoad(
  loader: JsonTableLoader,
  datasets: readonly Dataset[],
  config: LoaderConfig,
  out: Output = console.log
): Promise<boolean> {
  let clean = true;

  for (const dataset of datasets) {
    let records: unknown[];
    try {
      records = await readDataset(dataset, config);
    } catch (error) {
      const loaderError = LoaderError.fromUnknown(error, 'FETCH_ERROR');
      if (loaderError.category !== 'FETCH_ERROR') {
        throw loaderError;
      }
      console.error(`[CLI] Dataset ${dataset.table} failed: ${loaderError.message}`);
      out(`${dataset.table}: [FETCH_ERROR] ${loaderError.message}`);
      clean = false;
      continue;
    }

    try {
      if (dataset.snapshot && dataset.file === undefined) {
        saveSnapshot(records, config.snapshotDir, dataset.table);
      }

      const report = loader.loadRecords(dataset.table, records);
      out(formatReport(report));
      if (report.failures.length > 0) {
        clean = false;
      }
    } catch (error) {
      const loaderError = LoaderError.fromUnknown(error);
      if (loaderError.category === 'FATAL_CONNECTION') {
        throw loaderError;
      }
      console.error(`[CLI] Dataset ${dataset.table} failed: ${loaderError.message}`);
      out(`${dataset.table}: [${loaderError.category}] ${loaderError.message}`);
      clean = false;
    }
  }

  return clean;
}

function printUsage(out: Output): void {
  out('Usage: json-table-loader [load] [--datasets <file>] [--only <table>]');
  out('       json-table-loader tables');
  out('       json-table-loader split <table>');
  out('       json-table-loader drop-column <table> <column>');
}

/**
 * Run one command and return the process exit code
 */
export async function main(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const out: Output = console.log;
  let conn: SqliteConnection | undefined;

  try {
    const { values, positionals } = parseArgs({
      args: [...argv],
      options: {
        datasets: { type: 'string', short: 'd' },
        only: { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      allowPositionals: true,
    });

    if (values.help) {
      printUsage(out);
      return EXIT_OK;
    }

    const [command = 'load', ...args] = positionals;
    const config = loadConfig(env);

    if (!['load', 'tables', 'split', 'drop-column'].includes(command)) {
      throw configurationError(`Unknown command "${command}"`);
    }

    conn = new SqliteConnection(openDatabase(config.dbPath));
    const loader = new JsonTableLoader(conn, config.loader);

    switch (command) {
      case 'tables':
        for (const table of conn.listTables()) {
          out(table);
        }
        return EXIT_OK;

      case 'split': {
        const [table] = args;
        if (table === undefined) {
          throw configurationError('split needs a table name');
        }
        const report = splitJsonColumns(loader, table);
        for (const column of report.columns) {
          out(
            `${table}.${column.column} -> ${column.childTable}: ${column.rowsMigrated} migrated, ` +
              `${column.rowsFailed} failed${column.dropped ? ', column dropped' : ''}`
          );
        }
        return report.failures.length > 0 ? EXIT_FAILURES : EXIT_OK;
      }

      case 'drop-column': {
        const [table, column] = args;
        if (table === undefined || column === undefined) {
          throw configurationError('drop-column needs a table and a column name');
        }
        out(dropColumn(conn, table, column) ? `Dropped ${table}.${column}` : `${table}.${column} does not exist`);
        return EXIT_OK;
      }

      default: {
        let datasets = loadDatasets(values.datasets ?? config.datasetsFile);
        if (values.only !== undefined) {
          const only = values.only;
          datasets = datasets.filter((d) => d.table === only);
          if (datasets.length === 0) {
            throw configurationError(`No dataset for table "${only}"`);
          }
        }
        const clean = await runLoad(loader, datasets, config, out);
        return clean ? EXIT_OK : EXIT_FAILURES;
      }
    }
  } catch (error) {
    const loaderError = LoaderError.fromUnknown(error, 'CONFIGURATION_ERROR');
    console.error(`[CLI] ${loaderError.category}: ${loaderError.message}`);
    console.error(`[CLI] Hint: ${getRecoveryHint(loaderError.category)}`);
    return loaderError.category === 'CONFIGURATION_ERROR' ? EXIT_CONFIGURATION : EXIT_FAILURES;
  } finally {
    conn?.getConnection().close();
  }
}
