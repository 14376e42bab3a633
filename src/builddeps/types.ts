/**
 * Build-Dependency Types
 * ======================
 */

/**
 * Result of one discovery run.
 */
export interface DiscoveryResult {
  /** Sorted, duplicate-free build dependency tokens */
  builddeps: string[];
  /** pip download failed and the failure was tolerated; list may be incomplete */
  isPartial: boolean;
  /** Scratch workspace left on disk for inspection (partial runs only) */
  retainedWorkspace: string | null;
}

/**
 * Why the reconciler decided to write or skip.
 */
export type ReconcileReason =
  | 'write'               // Output will be written
  | 'no-new-dependencies' // Nothing left to write
  | 'unchanged';          // Same set as the existing output

/**
 * Input to output reconciliation.
 */
export interface ReconcileInput {
  /** Freshly discovered build dependencies */
  builddeps: readonly string[];
  /** Dependencies already present in the output file */
  prior: ReadonlySet<string>;
  /** Append to the output file instead of overwriting */
  append: boolean;
  /** Skip writing when nothing would change */
  onlyIfChanged: boolean;
}

/**
 * Reconciliation decision.
 */
export interface ReconcileDecision {
  /** Dependencies to render, sorted */
  effective: string[];
  write: boolean;
  reason: ReconcileReason;
}
