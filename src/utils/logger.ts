/**
 * Logger
 * ======
 *
 * Leveled `LEVEL: message` lines on stderr. Stdout stays free for output
 * that may be redirected into a file.
 */

import { chalkStderr } from 'chalk';

// =============================================================================
// Types
// =============================================================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Minimum level emitted (default: info) */
  level?: LogLevel;
  /** Line sink (default: process.stderr) */
  sink?: (line: string) => void;
  /** Colour level labels when stderr supports it (default: true) */
  color?: boolean;
}

// =============================================================================
// Implementation
// =============================================================================

const LABELS: Record<LogLevel, string> = {
  debug: 'DEBUG',
  info: 'INFO',
  warn: 'WARNING',
  error: 'ERROR',
};

const COLORS: Record<LogLevel, (text: string) => string> = {
  debug: chalkStderr.gray,
  info: chalkStderr.cyan,
  warn: chalkStderr.yellow,
  error: chalkStderr.red,
};

/**
 * Check a string against the known level names.
 */
export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a logger.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const sink = options.sink ?? ((line: string) => process.stderr.write(`${line}\n`));
  const color = options.color ?? true;

  const emit = (level: LogLevel, message: string): void => {
    if (LOG_LEVELS.indexOf(level) < threshold) {
      return;
    }
    const label = color ? COLORS[level](LABELS[level]) : LABELS[level];
    sink(`${label}: ${message}`);
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
  };
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = createLogger({ sink: () => {} });
