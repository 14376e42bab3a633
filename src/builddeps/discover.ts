/**
 * Discovery Orchestrator
 * ======================
 *
 * Sequences workspace → downloader → log scanner and decides whether the
 * result is complete or partial.
 *
 * Workspace lifecycle:
 * - complete run: workspace removed
 * - tolerated downloader failure: workspace kept, path reported
 * - fatal failure: workspace kept, log path carried by the error
 */

import { tmpdir } from 'node:os';

import { runDownloader, type RunCommand } from './downloader.js';
import { DownloaderError, FindBuilddepsError } from './errors.js';
import { scanBuildLogFile } from './log_scanner.js';
import { createScratchWorkspace, releaseScratchWorkspace } from './workspace.js';
import { GENERATOR_NAME } from './config.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { DiscoveryResult } from './types.js';

/**
 * Options for build dependency discovery.
 */
export interface DiscoverOptions {
  /** Bypass the pip cache */
  noCache?: boolean;
  /** Produce a partial result when pip download fails */
  ignoreErrors?: boolean;
  /** Downloader command (default: ['pip']) */
  downloaderCommand?: readonly string[];
  /** Parent directory for the scratch workspace (default: OS temp dir) */
  scratchRoot?: string;
  /** Command runner (default: real process spawn) */
  run?: RunCommand;
  logger?: Logger;
}

/**
 * Find build dependencies for the packages in the requirements files.
 *
 * @param requirementsFiles - Files listing all recursive runtime dependencies
 * @throws FindBuilddepsError on an untolerated downloader failure
 */
export async function findBuildDeps(
  requirementsFiles: readonly string[],
  options: DiscoverOptions = {}
): Promise<DiscoveryResult> {
  const logger = options.logger ?? silentLogger;
  const workspace = await createScratchWorkspace(
    options.scratchRoot ?? tmpdir(),
    `${GENERATOR_NAME}-`
  );
  logger.debug(`Scratch workspace: ${workspace.dir}`);

  let isPartial = false;

  try {
    logger.info('Running pip download, this may take a while');
    await runDownloader({
      command: options.downloaderCommand ?? ['pip'],
      destDir: workspace.dir,
      requirementsFiles,
      noCache: options.noCache ?? false,
      logPath: workspace.logPath,
      run: options.run,
    });
  } catch (error) {
    if (!(error instanceof DownloaderError)) {
      throw error;
    }
    if (error.kind === 'spawn-failed') {
      throw new FindBuilddepsError('DOWNLOADER_UNAVAILABLE', error.message, error.logPath);
    }

    const message = `Pip download failed, see ${error.logPath} for more info`;
    if (!options.ignoreErrors) {
      throw new FindBuilddepsError('DOWNLOAD_FAILED', message, error.logPath);
    }
    logger.error(message);
    logger.warn('Ignoring error...');
    isPartial = true;
  }

  logger.info('Looking for build dependencies in the output of pip download');
  const builddeps = await scanBuildLogFile(workspace.logPath);

  if (isPartial) {
    return { builddeps, isPartial, retainedWorkspace: workspace.dir };
  }

  await releaseScratchWorkspace(workspace);
  return { builddeps, isPartial, retainedWorkspace: null };
}
