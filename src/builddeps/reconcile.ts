/**
 * Output Reconciler
 * =================
 *
 * Decides what to persist given the fresh discovery and the existing output.
 * Pure; all I/O happens in the caller.
 *
 *   append  | effective
 *   --------+----------------------------
 *   no      | builddeps
 *   yes     | builddeps minus prior
 *
 * With onlyIfChanged, the write is skipped when `effective` is empty or,
 * when overwriting, equal to `prior`.
 *
 * Names compare as plain strings (case-sensitive).
 */

import { FindBuilddepsError } from './errors.js';
import type { ReconcileDecision, ReconcileInput } from './types.js';

/**
 * Compute the effective output set and the write/skip decision.
 */
export function reconcileOutput(input: ReconcileInput): ReconcileDecision {
  const effective = input.append
    ? input.builddeps.filter((name) => !input.prior.has(name))
    : [...input.builddeps];
  effective.sort();

  if (input.onlyIfChanged) {
    if (effective.length === 0) {
      return { effective, write: false, reason: 'no-new-dependencies' };
    }
    if (!input.append && setEquals(effective, input.prior)) {
      return { effective, write: false, reason: 'unchanged' };
    }
  }

  return { effective, write: true, reason: 'write' };
}

/**
 * Reject change-gating without an output file. Runs before any discovery.
 *
 * @throws FindBuilddepsError with code USAGE_ERROR
 */
export function assertOutputOptions(options: { onlyIfChanged: boolean; outputFile: string | null }): void {
  if (options.onlyIfChanged && options.outputFile === null) {
    throw new FindBuilddepsError(
      'USAGE_ERROR',
      '--only-write-on-update requires an output-file (-o/--output-file).'
    );
  }
}

/**
 * Set equality between a list and a set.
 */
function setEquals(items: readonly string[], set: ReadonlySet<string>): boolean {
  const unique = new Set(items);
  if (unique.size !== set.size) {
    return false;
  }
  for (const item of unique) {
    if (!set.has(item)) {
      return false;
    }
  }
  return true;
}
