/**
 * Filesystem helpers shared by the readers.
 */

/**
 * Check for an ENOENT filesystem error.
 */
export function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Line breaks of text read from disk: '\r\n', '\n' and a bare '\r'
 * (progress output rewrites a line with '\r').
 */
export const LINE_BREAK = /\r\n|\r|\n/;
