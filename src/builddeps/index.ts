/**
 * Build-Dependency Discovery
 * ==========================
 *
 * Finds the build dependencies of a Python project from its fully resolved
 * runtime requirements.
 */

// Types
export type { DiscoveryResult, ReconcileInput, ReconcileDecision, ReconcileReason } from './types.js';

// Errors
export { DownloaderError, FindBuilddepsError } from './errors.js';
export type { DownloaderErrorKind, FindBuilddepsErrorCode } from './errors.js';

// Log scanning and requirement files
export { scanBuildLog, scanBuildLogFile } from './log_scanner.js';
export { parseRequirementNames, readRequirementsFile } from './requirements_file.js';

// Downloader
export { buildDownloadCommand, runDownloader, spawnToLog } from './downloader.js';
export type { CommandExecution, RunCommand, DownloaderOptions, DownloadOutcome } from './downloader.js';

// Workspace
export { createScratchWorkspace, releaseScratchWorkspace, DOWNLOAD_LOG_NAME } from './workspace.js';
export type { ScratchWorkspace } from './workspace.js';

// Discovery
export { findBuildDeps } from './discover.js';
export type { DiscoverOptions } from './discover.js';

// Reconciliation, rendering, writing
export { reconcileOutput, assertOutputOptions } from './reconcile.js';
export { formatReport, formatTimestamp, NO_BUILDDEPS_LINE, PARTIAL_RESULT_LINE } from './report.js';
export type { ReportInput } from './report.js';
export { writeReport } from './output.js';
export type { WriteTarget } from './output.js';

// Configuration and command surface
export { resolveConfig, GENERATOR_NAME } from './config.js';
export type { BuilddepsConfig } from './config.js';
export { parseArgs, runFindBuilddeps, USAGE, EXIT_SUCCESS, EXIT_DISCOVERY_ERROR, EXIT_USAGE_ERROR } from './cli.js';
export type { ParsedArgs, CliDeps } from './cli.js';
