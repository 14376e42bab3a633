/**
 * Requirement File Reader
 * =======================
 *
 * Reads the top-level names of a flat requirements file, typically the
 * output of a previous run.
 */

import { readFile } from 'node:fs/promises';

import { isNotFound, LINE_BREAK } from '../utils/fs.js';

/**
 * Leading token of a line, up to whitespace, '#' or ';'.
 * Comment lines and indented lines never match.
 */
const REQUIREMENT_LINE = /^([^\s#;]+)/;

/**
 * Parse requirement names from file content.
 *
 * @param text - Requirements file content
 * @returns Set of requirement tokens found at line starts
 */
export function parseRequirementNames(text: string): Set<string> {
  const names = new Set<string>();
  for (const line of text.split(LINE_BREAK)) {
    const name = REQUIREMENT_LINE.exec(line)?.[1];
    if (name !== undefined) {
      names.add(name);
    }
  }
  return names;
}

/**
 * Read requirement names from a file.
 * A missing file is an empty set: the first run has no prior output.
 */
export async function readRequirementsFile(path: string): Promise<Set<string>> {
  try {
    return parseRequirementNames(await readFile(path, 'utf8'));
  } catch (error) {
    if (isNotFound(error)) {
      return new Set();
    }
    throw error;
  }
}
