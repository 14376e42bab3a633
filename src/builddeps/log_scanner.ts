/**
 * Log Scanner
 * ===========
 *
 * Extracts build dependencies from the verbose log of `pip download`.
 *
 * pip logs a top-level requirement as an unindented `Collecting <req>` line
 * and every requirement it resolves on the way (build requirements included)
 * as an indented one. The inputs already list every recursive runtime
 * dependency, so each indented requirement is a build dependency.
 *
 * This is the only module that knows the format of pip's log.
 */

import { readFile } from 'node:fs/promises';

import { isNotFound, LINE_BREAK } from '../utils/fs.js';

// =============================================================================
// Pattern
// =============================================================================

/**
 * Requirement token: non-whitespace, non-';' characters.
 * Matches `pkg`, `pkg==1.0`, `pkg[extra]==1.0`; environment markers are cut.
 */
const REQUIREMENT_PATTERN = String.raw`[^\s;]+`;

/**
 * Leading whitespace marks a dependency resolved on behalf of another one.
 */
const BUILDDEP_LINE = new RegExp(String.raw`^\s+Collecting (${REQUIREMENT_PATTERN})`);

// =============================================================================
// Scanning
// =============================================================================

/**
 * Scan log text for build dependencies.
 *
 * @param text - Raw log content
 * @returns Sorted, duplicate-free requirement tokens
 */
export function scanBuildLog(text: string): string[] {
  const builddeps = new Set<string>();

  for (const line of text.split(LINE_BREAK)) {
    const match = BUILDDEP_LINE.exec(line);
    const requirement = match?.[1];
    if (requirement !== undefined) {
      builddeps.add(requirement);
    }
  }

  return [...builddeps].sort();
}

/**
 * Scan a log file. A log that was never written scans as empty.
 */
export async function scanBuildLogFile(logPath: string): Promise<string[]> {
  let text: string;
  try {
    text = await readFile(logPath, 'utf8');
  } catch (error) {
    if (isNotFound(error)) {
      return [];
    }
    throw error;
  }
  return scanBuildLog(text);
}
