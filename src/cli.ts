#!/usr/bin/env node
/**
 * thermal-map command line entry point.
 *
 * Usage: npx tsx src/cli.ts [--config <file>] [--log <file>] [--template <file>] [--out <dir>]
 */

import { isThermalMapError } from './errors.js';
import { runCli } from './cli/run.js';

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    process.stderr.write(isThermalMapError(err) ? `Error [${err.code}]: ${message}\n` : `Error: ${message}\n`);
    process.exitCode = 1;
  });
