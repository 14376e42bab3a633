/**
 * Build-Dependency Errors
 * =======================
 *
 * Typed failures raised by discovery and by the command surface.
 * The CLI maps `FindBuilddepsError.code` onto its exit codes.
 */

// =============================================================================
// Downloader Errors
// =============================================================================

/**
 * How the downloader invocation failed.
 */
export type DownloaderErrorKind =
  | 'exit-status'   // Process ran and exited non-zero
  | 'spawn-failed'; // Process could not be started

/**
 * Failure of the single downloader invocation.
 */
export class DownloaderError extends Error {
  constructor(
    public readonly kind: DownloaderErrorKind,
    message: string,
    public readonly logPath: string,
    public readonly exitCode: number | null = null
  ) {
    super(message);
    this.name = 'DownloaderError';
  }
}

// =============================================================================
// Run Errors
// =============================================================================

/**
 * Error codes for fatal run failures.
 */
export type FindBuilddepsErrorCode =
  | 'USAGE_ERROR'             // Invalid option combination
  | 'DOWNLOAD_FAILED'         // Downloader exited non-zero, not tolerated
  | 'DOWNLOADER_UNAVAILABLE'; // Downloader could not be started

/**
 * Fatal failure of a find-builddeps run.
 */
export class FindBuilddepsError extends Error {
  constructor(
    public readonly code: FindBuilddepsErrorCode,
    message: string,
    public readonly logPath: string | null = null
  ) {
    super(message);
    this.name = 'FindBuilddepsError';
  }
}
