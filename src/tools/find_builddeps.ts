#!/usr/bin/env node
/**
 * find-builddeps CLI
 * ==================
 *
 * Finds the build dependencies of a fully resolved runtime requirements file
 * by running `pip download` in source-only mode.
 *
 * Usage:
 *   find-builddeps [options] REQUIREMENTS_FILE...
 *
 * Exit codes:
 *   0 - Success (including "nothing changed, nothing written")
 *   1 - pip download failed and --ignore-errors was not given
 *   2 - Usage error
 *
 * Output:
 *   Requirements-style list of build dependencies, to stdout or --output-file
 */

import { runFindBuilddeps } from '../builddeps/cli.js';

/**
 * Main entry point.
 */
async function main(): Promise<void> {
  const exitCode = await runFindBuilddeps(process.argv.slice(2));
  process.exit(exitCode);
}

main().catch((err) => {
  console.error(`ERROR: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
