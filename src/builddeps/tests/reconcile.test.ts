/**
 * Output Reconciler Tests
 * =======================
 *
 * Tests for reconcileOutput() across append/overwrite x gated/ungated,
 * and for the output-option precondition.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';

import { assertOutputOptions, reconcileOutput } from '../reconcile.js';
import { FindBuilddepsError } from '../errors.js';

describe('Output Reconciler', () => {
  describe('Effective Set', () => {
    it('appends only names missing from the prior output', () => {
      const decision = reconcileOutput({
        builddeps: ['a', 'c'],
        prior: new Set(['a', 'b']),
        append: true,
        onlyIfChanged: false,
      });
      assert.deepStrictEqual(decision, { effective: ['c'], write: true, reason: 'write' });
    });

    it('keeps the full set when overwriting', () => {
      const decision = reconcileOutput({
        builddeps: ['a', 'c'],
        prior: new Set(['a', 'b']),
        append: false,
        onlyIfChanged: false,
      });
      assert.deepStrictEqual(decision.effective, ['a', 'c']);
      assert.strictEqual(decision.write, true);
    });

    it('still writes an empty set when not gated', () => {
      const decision = reconcileOutput({ builddeps: [], prior: new Set(), append: false, onlyIfChanged: false });
      assert.deepStrictEqual(decision, { effective: [], write: true, reason: 'write' });
    });

    it('compares names case-sensitively', () => {
      const decision = reconcileOutput({
        builddeps: ['Flit_Core'],
        prior: new Set(['flit_core']),
        append: true,
        onlyIfChanged: false,
      });
      assert.deepStrictEqual(decision.effective, ['Flit_Core']);
    });

    it('does not mutate its inputs', () => {
      const builddeps = ['b', 'a'];
      reconcileOutput({ builddeps, prior: new Set(), append: false, onlyIfChanged: false });
      assert.deepStrictEqual(builddeps, ['b', 'a']);
    });
  });

  describe('Change Gating', () => {
    it('skips an overwrite with the same set', () => {
      const decision = reconcileOutput({
        builddeps: ['a', 'b'],
        prior: new Set(['a', 'b']),
        append: false,
        onlyIfChanged: true,
      });
      assert.deepStrictEqual(decision, { effective: ['a', 'b'], write: false, reason: 'unchanged' });
    });

    it('writes an overwrite with a different set', () => {
      const decision = reconcileOutput({
        builddeps: ['a'],
        prior: new Set(['a', 'b']),
        append: false,
        onlyIfChanged: true,
      });
      assert.strictEqual(decision.write, true);
    });

    it('skips an append with nothing new', () => {
      const decision = reconcileOutput({
        builddeps: ['a'],
        prior: new Set(['a', 'b']),
        append: true,
        onlyIfChanged: true,
      });
      assert.deepStrictEqual(decision, { effective: [], write: false, reason: 'no-new-dependencies' });
    });

    it('skips when nothing was discovered', () => {
      const decision = reconcileOutput({ builddeps: [], prior: new Set(['a']), append: false, onlyIfChanged: true });
      assert.strictEqual(decision.write, false);
      assert.strictEqual(decision.reason, 'no-new-dependencies');
    });

    it('writes an append with new names', () => {
      const decision = reconcileOutput({
        builddeps: ['a', 'd'],
        prior: new Set(['a']),
        append: true,
        onlyIfChanged: true,
      });
      assert.deepStrictEqual(decision, { effective: ['d'], write: true, reason: 'write' });
    });
  });

  describe('assertOutputOptions', () => {
    it('rejects change gating without an output file', () => {
      assert.throws(
        () => assertOutputOptions({ onlyIfChanged: true, outputFile: null }),
        (error: unknown) => error instanceof FindBuilddepsError && error.code === 'USAGE_ERROR'
      );
    });

    it('accepts change gating with an output file', () => {
      assert.doesNotThrow(() => assertOutputOptions({ onlyIfChanged: true, outputFile: 'out.in' }));
    });

    it('accepts stdout without gating', () => {
      assert.doesNotThrow(() => assertOutputOptions({ onlyIfChanged: false, outputFile: null }));
    });
  });
});
