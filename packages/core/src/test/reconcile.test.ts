/**
 * Reconciliation tests — covers merge/reconcile.ts.
 */

import { describe, it, expect } from 'vitest';
import { classify } from '../merge/classify.js';
import { reconcile, type ReconcileStrategy } from '../merge/reconcile.js';
import type { Unit } from '../merge/shared.js';
import { makeFunction, makeUnit } from './merge-units.js';

const PATH = 'src/scale.ts';

function verdictFor(key: string, base: Unit[], a: Unit[], b: Unit[]) {
  const verdict = classify(base, a, b).get(key);
  if (!verdict) throw new Error(`no verdict for ${key}`);
  return verdict;
}

const v = (text: string) => makeUnit('variable', 'variable:limit', text);

describe('reconcile', () => {
  it('keeps Base for unchanged units', () => {
    const unit = v('const limit = 1;');
    expect(reconcile(verdictFor('variable:limit', [unit], [unit], [unit]), { path: PATH })).toEqual({
      status: 'resolved', key: 'variable:limit', text: 'const limit = 1;', strategy: 'base',
    });
  });

  it('takes the changed side for one-sided modifications and additions', () => {
    const base = [v('const limit = 1;')];
    const modified = reconcile(verdictFor('variable:limit', base, base, [v('const limit = 2;')]), { path: PATH });
    expect(modified).toEqual({ status: 'resolved', key: 'variable:limit', text: 'const limit = 2;', strategy: 'side-b' });

    const added = reconcile(verdictFor('variable:limit', [], [v('const limit = 3;')], []), { path: PATH });
    expect(added).toEqual({ status: 'resolved', key: 'variable:limit', text: 'const limit = 3;', strategy: 'side-a' });
  });

  it('drops units removed on one side and unchanged on the other', () => {
    const base = [v('const limit = 1;')];
    expect(reconcile(verdictFor('variable:limit', base, [], base), { path: PATH })).toBeNull();
    expect(reconcile(verdictFor('variable:limit', base, base, []), { path: PATH })).toBeNull();
    expect(reconcile(verdictFor('variable:limit', base, [], []), { path: PATH })).toBeNull();
  });

  it('reports delete-modify when the kept side changed the unit', () => {
    const base = [v('const limit = 1;')];
    const resolution = reconcile(verdictFor('variable:limit', base, [], [v('const limit = 2;')]), { path: PATH });
    expect(resolution).toEqual({
      status: 'conflict',
      key: 'variable:limit',
      conflict: {
        path: PATH,
        key: 'variable:limit',
        reason: 'delete-modify',
        baseText: 'const limit = 1;',
        aText: null,
        bText: 'const limit = 2;',
        lowConfidence: false,
      },
    });
  });

  it('resolves identical edits on both sides as convergent', () => {
    const base = [v('const limit = 1;')];
    const edited = [v('const limit = 5;')];
    expect(reconcile(verdictFor('variable:limit', base, edited, [v('const limit = 5;')]), { path: PATH })).toEqual({
      status: 'resolved', key: 'variable:limit', text: 'const limit = 5;', strategy: 'convergent',
    });
  });

  it('reports incompatible edits', () => {
    const base = [v('const limit = 1;')];
    const resolution = reconcile(verdictFor('variable:limit', base, [v('const limit = 2;')], [v('const limit = 3;')]), { path: PATH });
    expect(resolution?.status).toBe('conflict');
    if (resolution?.status === 'conflict') {
      expect(resolution.conflict.reason).toBe('incompatible-edit');
      expect(resolution.conflict.aText).toBe('const limit = 2;');
      expect(resolution.conflict.bText).toBe('const limit = 3;');
    }
  });

  it('reconciles a parameter rename on either side', () => {
    const base = [makeFunction('scale', 'function scale(value) { return value * 2; }')];
    const renamed = [makeFunction('scale', 'function scale(input) { return input * 2; }')];
    const edited = [makeFunction('scale', 'function scale(value) { return value * 3; }')];
    const expected = {
      status: 'resolved',
      key: 'function:scale',
      text: 'function scale(input) { return input * 3; }',
      strategy: 'rename-parameter',
    };

    expect(reconcile(verdictFor('function:scale', base, renamed, edited), { path: PATH })).toEqual(expected);
    expect(reconcile(verdictFor('function:scale', base, edited, renamed), { path: PATH })).toEqual(expected);
  });

  it('treats differing additions under a positional key as ambiguous identity', () => {
    const a = [makeUnit('statement', 'anonymous-at-position-0', 'setup(1);')];
    const b = [makeUnit('statement', 'anonymous-at-position-0', 'setup(2);')];
    const resolution = reconcile(verdictFor('anonymous-at-position-0', [], a, b), { path: PATH });
    expect(resolution?.status).toBe('conflict');
    if (resolution?.status === 'conflict') {
      expect(resolution.conflict.reason).toBe('ambiguous-identity');
      expect(resolution.conflict.lowConfidence).toBe(true);
    }
  });

  it('uses the strategies it is given', () => {
    const preferA: ReconcileStrategy = { name: 'side-a', apply: (_base, a) => a.text };
    const base = [v('const limit = 1;')];
    const resolution = reconcile(
      verdictFor('variable:limit', base, [v('const limit = 2;')], [v('const limit = 3;')]),
      { path: PATH, strategies: [preferA] },
    );
    expect(resolution).toEqual({ status: 'resolved', key: 'variable:limit', text: 'const limit = 2;', strategy: 'side-a' });
  });
});
