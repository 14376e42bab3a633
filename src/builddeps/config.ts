/**
 * Runtime Configuration
 * =====================
 *
 * Environment overrides, resolved once at startup:
 *
 *   FIND_BUILDDEPS_PIP        Downloader command (default: pip), e.g. "python3 -m pip"
 *   FIND_BUILDDEPS_TMPDIR     Parent of scratch workspaces (default: OS temp dir)
 *   FIND_BUILDDEPS_LOG_LEVEL  debug | info | warn | error (default: info)
 */

import { tmpdir } from 'node:os';

import { isLogLevel, type LogLevel } from '../utils/logger.js';

/**
 * Name used in report headers and scratch directory prefixes.
 */
export const GENERATOR_NAME = 'find-builddeps';

const DEFAULT_PIP_COMMAND: readonly string[] = ['pip'];
const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/**
 * Resolved runtime configuration.
 */
export interface BuilddepsConfig {
  pipCommand: readonly string[];
  scratchRoot: string;
  logLevel: LogLevel;
  /** Problems found while resolving, reported once a logger exists */
  warnings: string[];
}

/**
 * Resolve configuration from environment variables.
 */
export function resolveConfig(env: NodeJS.ProcessEnv = process.env): BuilddepsConfig {
  const warnings: string[] = [];

  const pipEnv = env.FIND_BUILDDEPS_PIP?.trim();
  const pipCommand = pipEnv ? pipEnv.split(/\s+/) : DEFAULT_PIP_COMMAND;

  const scratchRoot = env.FIND_BUILDDEPS_TMPDIR?.trim() || tmpdir();

  let logLevel = DEFAULT_LOG_LEVEL;
  const levelEnv = env.FIND_BUILDDEPS_LOG_LEVEL?.trim().toLowerCase();
  if (levelEnv) {
    if (isLogLevel(levelEnv)) {
      logLevel = levelEnv;
    } else {
      warnings.push(
        `FIND_BUILDDEPS_LOG_LEVEL must be one of debug, info, warn, error; using ${DEFAULT_LOG_LEVEL}`
      );
    }
  }

  return { pipCommand, scratchRoot, logLevel, warnings };
}
