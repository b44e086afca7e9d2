/**
 * Reconciliation — turns one Verdict into one Resolution (or none, for
 * removals). Keys are reconciled independently of each other.
 *
 * For modified-both units an ordered list of strategies is tried; the
 * first one returning text wins and anything left over is a conflict.
 */

import { reconcileParameterRename } from './rename.js';
import type { ConflictReason, ConflictRecord, Resolution, ResolutionStrategy, Unit, Verdict } from './shared.js';

// ---------------------------------------------------------------------------
// Strategies
// ---------------------------------------------------------------------------

export interface ReconcileStrategy {
  name: ResolutionStrategy;
  apply(base: Unit, a: Unit, b: Unit): string | null;
}

/** Checked in order for every modified-both verdict. */
export const MODIFIED_BOTH_STRATEGIES: readonly ReconcileStrategy[] = [
  {
    name: 'convergent',
    apply: (_base, a, b) => (a.text === b.text ? a.text : null),
  },
  {
    name: 'rename-parameter',
    apply: (base, a, b) => reconcileParameterRename(base, a, b),
  },
  {
    name: 'rename-parameter',
    apply: (base, a, b) => reconcileParameterRename(base, b, a),
  },
];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function resolved(key: string, text: string, strategy: ResolutionStrategy): Resolution {
  return { status: 'resolved', key, text, strategy };
}

function conflict(path: string, verdict: Verdict, reason: ConflictReason): Resolution {
  const record: ConflictRecord = {
    path,
    key: verdict.key,
    reason,
    baseText: verdict.base?.text ?? null,
    aText: verdict.a?.text ?? null,
    bText: verdict.b?.text ?? null,
    lowConfidence: [verdict.base, verdict.a, verdict.b].some(u => u?.ambiguous === true),
  };
  return { status: 'conflict', key: verdict.key, conflict: record };
}

function missing(verdict: Verdict, side: 'base' | 'a' | 'b'): never {
  throw new Error(`Verdict ${verdict.verdict} for ${verdict.key} has no ${side} unit`);
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export interface ReconcileOptions {
  path: string;
  strategies?: readonly ReconcileStrategy[];
}

/**
 * Resolve one verdict. Returns null when the unit is dropped from the
 * output (removal on one side with the other side unchanged, or on both).
 */
export function reconcile(verdict: Verdict, options: ReconcileOptions): Resolution | null {
  const { path } = options;
  const { key, base, a, b } = verdict;

  switch (verdict.verdict) {
    case 'unchanged':
      return resolved(key, base?.text ?? missing(verdict, 'base'), 'base');

    case 'modified-A':
      return resolved(key, a?.text ?? missing(verdict, 'a'), 'side-a');

    case 'modified-B':
      return resolved(key, b?.text ?? missing(verdict, 'b'), 'side-b');

    case 'added-A':
      return resolved(key, a?.text ?? missing(verdict, 'a'), 'side-a');

    case 'added-B':
      return resolved(key, b?.text ?? missing(verdict, 'b'), 'side-b');

    case 'added-both': {
      const aText = a?.text ?? missing(verdict, 'a');
      const bText = b?.text ?? missing(verdict, 'b');
      if (aText === bText) return resolved(key, aText, 'convergent');
      const ambiguous = a?.ambiguous === true || b?.ambiguous === true;
      return conflict(path, verdict, ambiguous ? 'ambiguous-identity' : 'incompatible-edit');
    }

    case 'removed-A': {
      const kept = b ?? missing(verdict, 'b');
      const baseUnit = base ?? missing(verdict, 'base');
      return kept.hash === baseUnit.hash ? null : conflict(path, verdict, 'delete-modify');
    }

    case 'removed-B': {
      const kept = a ?? missing(verdict, 'a');
      const baseUnit = base ?? missing(verdict, 'base');
      return kept.hash === baseUnit.hash ? null : conflict(path, verdict, 'delete-modify');
    }

    case 'removed-both':
      return null;

    case 'modified-both': {
      const baseUnit = base ?? missing(verdict, 'base');
      const aUnit = a ?? missing(verdict, 'a');
      const bUnit = b ?? missing(verdict, 'b');
      for (const strategy of options.strategies ?? MODIFIED_BOTH_STRATEGIES) {
        const text = strategy.apply(baseUnit, aUnit, bUnit);
        if (text !== null) return resolved(key, text, strategy.name);
      }
      // Positional pairing is a guess; say so rather than claim an edit clash.
      const ambiguous = baseUnit.ambiguous || aUnit.ambiguous || bUnit.ambiguous;
      return conflict(path, verdict, ambiguous ? 'ambiguous-identity' : 'incompatible-edit');
    }
  }
}
