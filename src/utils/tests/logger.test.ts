/**
 * Logger Tests
 * ============
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { createLogger, isLogLevel } from '../logger.js';

describe('Logger', () => {
  it('prefixes lines with the level label', () => {
    const lines: string[] = [];
    const logger = createLogger({ sink: (line) => lines.push(line), color: false });

    logger.info('Running pip download, this may take a while');
    logger.warn('Ignoring error...');
    logger.error('boom');

    assert.deepStrictEqual(lines, [
      'INFO: Running pip download, this may take a while',
      'WARNING: Ignoring error...',
      'ERROR: boom',
    ]);
  });

  it('drops messages below the threshold', () => {
    const lines: string[] = [];
    const logger = createLogger({ level: 'warn', sink: (line) => lines.push(line), color: false });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');

    assert.deepStrictEqual(lines, ['WARNING: shown']);
  });

  it('hides debug output by default', () => {
    const lines: string[] = [];
    createLogger({ sink: (line) => lines.push(line), color: false }).debug('hidden');
    assert.deepStrictEqual(lines, []);
  });

  it('recognises level names', () => {
    assert.strictEqual(isLogLevel('debug'), true);
    assert.strictEqual(isLogLevel('warning'), false);
  });
});
