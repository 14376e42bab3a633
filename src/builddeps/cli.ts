/**
 * find-builddeps Command
 * ======================
 *
 * Argument parsing and the run sequence behind `src/tools/find_builddeps.ts`.
 * Kept free of `process.exit` so it can be driven from tests.
 *
 * Exit codes:
 *   0 - Output written, or skipped because nothing changed
 *   1 - Discovery failed (pip download failed without --ignore-errors)
 *   2 - Usage error
 */

import { GENERATOR_NAME, resolveConfig } from './config.js';
import { findBuildDeps } from './discover.js';
import { FindBuilddepsError } from './errors.js';
import { writeReport } from './output.js';
import { assertOutputOptions, reconcileOutput } from './reconcile.js';
import { formatReport } from './report.js';
import { readRequirementsFile } from './requirements_file.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { RunCommand } from './downloader.js';

// =============================================================================
// Constants
// =============================================================================

export const EXIT_SUCCESS = 0;
export const EXIT_DISCOVERY_ERROR = 1;
export const EXIT_USAGE_ERROR = 2;

export const USAGE = `Usage: ${GENERATOR_NAME} [options] REQUIREMENTS_FILE...

Find build dependencies for all your runtime dependencies. The input must be
a requirements.txt file containing all the *recursive* runtime dependencies
(pip-compile can generate one). The output is an intermediate file that must
go through pip-compile before it is used as a lockfile.

Options:
  -o, --output-file FILE    Write output to this file
  -a, --append              Append to the output file instead of overwriting
  --no-cache                Do not use pip cache when downloading packages
  --ignore-errors           Generate partial output even if pip download fails
  --only-write-on-update    Only write the output file if dependencies changed (or,
                            with --append, if new dependencies were found)
  -h, --help                Show this help message

Environment:
  FIND_BUILDDEPS_PIP        Downloader command (default: pip)
  FIND_BUILDDEPS_TMPDIR     Parent directory for scratch workspaces
  FIND_BUILDDEPS_LOG_LEVEL  debug | info | warn | error (default: info)`;

// =============================================================================
// Argument Parsing
// =============================================================================

/**
 * Parsed CLI arguments.
 */
export interface ParsedArgs {
  requirementsFiles: string[];
  outputFile: string | null;
  append: boolean;
  noCache: boolean;
  ignoreErrors: boolean;
  onlyWriteOnUpdate: boolean;
  help: boolean;
}

/**
 * Parse and validate command line arguments.
 *
 * @throws FindBuilddepsError with code USAGE_ERROR
 */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    requirementsFiles: [],
    outputFile: null,
    append: false,
    noCache: false,
    ignoreErrors: false,
    onlyWriteOnUpdate: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';

    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
      return parsed;
    } else if (arg === '--output-file' || arg === '-o') {
      parsed.outputFile = optionValue(arg, args[i + 1]);
      i++;
    } else if (arg.startsWith('--output-file=')) {
      const value = arg.slice('--output-file='.length);
      if (value === '') {
        throw usageError('--output-file requires a value');
      }
      parsed.outputFile = value;
    } else if (/^-[aho]/.test(arg) && arg.length > 2) {
      // Clustered short flags: -ao FILE, -aoFILE, -oFILE
      const consumed = parseShortCluster(arg, args[i + 1], parsed);
      if (parsed.help) {
        return parsed;
      }
      i += consumed;
    } else if (arg === '--append' || arg === '-a') {
      parsed.append = true;
    } else if (arg === '--no-cache') {
      parsed.noCache = true;
    } else if (arg === '--ignore-errors') {
      parsed.ignoreErrors = true;
    } else if (arg === '--only-write-on-update') {
      parsed.onlyWriteOnUpdate = true;
    } else if (arg === '--') {
      parsed.requirementsFiles.push(...args.slice(i + 1));
      break;
    } else if (arg.startsWith('-') && arg !== '-') {
      throw usageError(`Unknown option: ${arg}`);
    } else {
      parsed.requirementsFiles.push(arg);
    }
  }

  if (parsed.requirementsFiles.length === 0) {
    throw usageError('at least one REQUIREMENTS_FILE is required');
  }

  assertOutputOptions({ onlyIfChanged: parsed.onlyWriteOnUpdate, outputFile: parsed.outputFile });

  return parsed;
}

/**
 * Value of an option given as a separate argument. A lone '-' is a value,
 * anything else starting with '-' is the next option.
 */
function optionValue(option: string, next: string | undefined): string {
  if (next === undefined || (next.startsWith('-') && next !== '-')) {
    throw usageError(`${option} requires a value`);
  }
  return next;
}

/**
 * Apply a cluster of short flags such as `-ao` or `-oFILE`.
 * `-o` takes the rest of the cluster as its value, or the next argument.
 *
 * @returns Number of following arguments consumed (0 or 1)
 */
function parseShortCluster(arg: string, next: string | undefined, parsed: ParsedArgs): number {
  for (let j = 1; j < arg.length; j++) {
    const flag = arg[j];
    if (flag === 'a') {
      parsed.append = true;
    } else if (flag === 'h') {
      parsed.help = true;
      return 0;
    } else if (flag === 'o') {
      const attached = arg.slice(j + 1);
      if (attached !== '') {
        parsed.outputFile = attached;
        return 0;
      }
      parsed.outputFile = optionValue('-o', next);
      return 1;
    } else {
      throw usageError(`Unknown option: ${arg}`);
    }
  }
  return 0;
}

function usageError(message: string): FindBuilddepsError {
  return new FindBuilddepsError('USAGE_ERROR', message);
}

// =============================================================================
// Run
// =============================================================================

/**
 * Injectable collaborators, defaulting to the real process environment.
 */
export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  stdout?: (text: string) => void;
  logger?: Logger;
  /** Downloader runner (default: real process spawn) */
  run?: RunCommand;
  /** Clock for the report header */
  now?: () => Date;
}

/**
 * Run find-builddeps and return the process exit code.
 */
export async function runFindBuilddeps(args: readonly string[], deps: CliDeps = {}): Promise<number> {
  const config = resolveConfig(deps.env ?? process.env);
  const logger = deps.logger ?? createLogger({ level: config.logLevel });
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));

  for (const warning of config.warnings) {
    logger.warn(warning);
  }

  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(args);
  } catch (error) {
    if (error instanceof FindBuilddepsError) {
      logger.error(`${error.message} (see --help)`);
      return EXIT_USAGE_ERROR;
    }
    throw error;
  }

  if (parsed.help) {
    stdout(`${USAGE}\n`);
    return EXIT_SUCCESS;
  }

  logger.info('Please make sure the input files meet the requirements of this script (see --help)');

  try {
    const discovery = await findBuildDeps(parsed.requirementsFiles, {
      noCache: parsed.noCache,
      ignoreErrors: parsed.ignoreErrors,
      downloaderCommand: config.pipCommand,
      scratchRoot: config.scratchRoot,
      run: deps.run,
      logger,
    });

    // Prior output is consulted only for change gating; a plain --append
    // appends everything discovered
    const outputFile = parsed.outputFile;
    const prior =
      outputFile !== null && parsed.onlyWriteOnUpdate
        ? await readRequirementsFile(outputFile)
        : new Set<string>();

    const decision = reconcileOutput({
      builddeps: discovery.builddeps,
      prior,
      append: parsed.append,
      onlyIfChanged: parsed.onlyWriteOnUpdate,
    });

    if (!decision.write) {
      logger.info('No new build dependencies found.');
      return EXIT_SUCCESS;
    }

    const content = formatReport({
      builddeps: decision.effective,
      isPartial: discovery.isPartial,
      generator: GENERATOR_NAME,
      now: deps.now?.() ?? new Date(),
    });

    logger.info('Make sure to pip-compile the output before using it');
    if (discovery.isPartial) {
      logger.warn('Pip download failed, output may be incomplete!');
    }

    await writeReport(content, { outputFile, append: parsed.append, stdout });
    return EXIT_SUCCESS;
  } catch (error) {
    if (error instanceof FindBuilddepsError) {
      logger.error(error.message);
      return error.code === 'USAGE_ERROR' ? EXIT_USAGE_ERROR : EXIT_DISCOVERY_ERROR;
    }
    throw error;
  }
}
