/**
 * Scratch Workspace
 * =================
 *
 * Uniquely named temp directory owned by one discovery run. It receives the
 * downloaded sources and the captured downloader log.
 *
 * Released after a complete run; kept after a partial one so the raw log
 * can be inspected.
 */

import { mkdir, mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * File name of the captured downloader log inside the workspace.
 */
export const DOWNLOAD_LOG_NAME = 'pip-download-output.txt';

/**
 * Scratch workspace instance.
 */
export interface ScratchWorkspace {
  /** Root directory, also the download destination */
  dir: string;
  /** Captured stdout+stderr of the downloader */
  logPath: string;
}

/**
 * Create a new scratch workspace.
 *
 * @param root - Parent directory (created if missing)
 * @param prefix - Directory name prefix, a random suffix is appended
 */
export async function createScratchWorkspace(root: string, prefix: string): Promise<ScratchWorkspace> {
  await mkdir(root, { recursive: true });
  const dir = await mkdtemp(join(root, prefix));
  return { dir, logPath: join(dir, DOWNLOAD_LOG_NAME) };
}

/**
 * Remove a scratch workspace and everything in it.
 */
export async function releaseScratchWorkspace(workspace: ScratchWorkspace): Promise<void> {
  await rm(workspace.dir, { recursive: true, force: true });
}
