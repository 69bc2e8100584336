#!/usr/bin/env node
/**
 * json-table-loader - CLI entry point
 *
 * Usage:
 *   npx json-table-loader                 # load every dataset in datasets.json
 *   node dist/src/bin.js split launches   # direct invocation
 *
 * @module bin
 */

import { loadEnvironment, main } from './cli.js';

loadEnvironment();

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[CLI] Fatal error:', error);
    process.exit(1);
  });
