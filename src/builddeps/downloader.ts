/**
 * Downloader Invoker
 * ==================
 *
 * Runs `pip download` once against the input requirements files.
 *
 * Key guarantees:
 * - Source-only: `--no-binary :all:` forces every package to be built
 * - Verbose: the log carries the `Collecting` lines the scanner needs
 * - Merged capture: stdout and stderr go to one log file
 * - Single attempt: no retry, no timeout
 */

import { spawn } from 'node:child_process';
import { open } from 'node:fs/promises';

import { DownloaderError } from './errors.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Outcome of running a command with its output captured to a file.
 */
export interface CommandExecution {
  /** Exit status, null when killed by a signal or never started */
  exitCode: number | null;
  /** Terminating signal, if any */
  signal: NodeJS.Signals | null;
  /** Error message if spawn failed */
  error?: string;
}

/**
 * Runs `argv` with merged stdout/stderr written to `logPath`.
 */
export type RunCommand = (argv: readonly string[], logPath: string) => Promise<CommandExecution>;

/**
 * Options for a downloader invocation.
 */
export interface DownloaderOptions {
  /** Downloader executable and leading args (e.g. ['pip']) */
  command: readonly string[];
  /** Destination for downloaded sources */
  destDir: string;
  /** Requirements files, one `-r` each */
  requirementsFiles: readonly string[];
  /** Pass --no-cache-dir */
  noCache: boolean;
  /** Captured log location */
  logPath: string;
  /** Command runner (default: spawnToLog) */
  run?: RunCommand;
}

/**
 * Successful downloader invocation.
 */
export interface DownloadOutcome {
  logPath: string;
}

// =============================================================================
// Command
// =============================================================================

/**
 * Build the downloader argv.
 */
export function buildDownloadCommand(
  options: Pick<DownloaderOptions, 'command' | 'destDir' | 'requirementsFiles' | 'noCache'>
): string[] {
  const argv = [
    ...options.command,
    'download',
    '-d',
    options.destDir,
    '--no-binary',
    ':all:',
    '--use-pep517',
    '--verbose',
  ];
  if (options.noCache) {
    argv.push('--no-cache-dir');
  }
  for (const file of options.requirementsFiles) {
    argv.push('-r', file);
  }
  return argv;
}

// =============================================================================
// Execution
// =============================================================================

/**
 * Spawn a command and wait for it, both output streams appended to one file.
 */
export const spawnToLog: RunCommand = async (argv, logPath) => {
  const [executable, ...args] = argv;
  const log = await open(logPath, 'w');

  try {
    if (executable === undefined) {
      return { exitCode: null, signal: null, error: 'Empty command' };
    }

    return await new Promise<CommandExecution>((resolve) => {
      let settled = false;
      const settle = (execution: CommandExecution): void => {
        if (!settled) {
          settled = true;
          resolve(execution);
        }
      };

      const proc = spawn(executable, args, {
        stdio: ['ignore', log.fd, log.fd],
      });

      proc.on('error', (err) => {
        settle({ exitCode: null, signal: null, error: err.message });
      });

      proc.on('close', (code, signal) => {
        settle({ exitCode: code, signal });
      });
    });
  } finally {
    await log.close();
  }
};

/**
 * Invoke the downloader once.
 *
 * @throws DownloaderError when the process cannot start or exits non-zero
 */
export async function runDownloader(options: DownloaderOptions): Promise<DownloadOutcome> {
  const run = options.run ?? spawnToLog;
  const argv = buildDownloadCommand(options);
  const execution = await run(argv, options.logPath);

  if (execution.error !== undefined) {
    throw new DownloaderError(
      'spawn-failed',
      `Could not start ${argv[0] ?? 'downloader'}: ${execution.error}`,
      options.logPath
    );
  }

  if (execution.exitCode !== 0) {
    const status =
      execution.exitCode === null
        ? `was terminated by ${execution.signal ?? 'a signal'}`
        : `exited with code ${execution.exitCode}`;
    throw new DownloaderError(
      'exit-status',
      `pip download ${status}`,
      options.logPath,
      execution.exitCode
    );
  }

  return { logPath: options.logPath };
}
