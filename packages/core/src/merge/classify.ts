/**
 * Three-way classification — compares Base→A and Base→B per identity key.
 *
 * Pure: no I/O, no shared state.
 */

import type { Unit, Verdict, VerdictKind, VerdictMap } from './shared.js';

function indexByKey(units: Unit[]): Map<string, Unit> {
  return new Map(units.map((u): [string, Unit] => [u.key, u]));
}

function classifyKey(base: Unit | undefined, a: Unit | undefined, b: Unit | undefined): VerdictKind {
  if (!base) {
    if (a && b) return 'added-both';
    return a ? 'added-A' : 'added-B';
  }
  if (!a && !b) return 'removed-both';
  if (!a) return 'removed-A';
  if (!b) return 'removed-B';

  const aChanged = a.hash !== base.hash;
  const bChanged = b.hash !== base.hash;
  // Identical independent edits are still modified-both; the reconciler
  // treats equal outcomes as convergent.
  if (aChanged && bChanged) return 'modified-both';
  if (aChanged) return 'modified-A';
  if (bChanged) return 'modified-B';
  return 'unchanged';
}

/**
 * Classify every identity key found in Base ∪ A ∪ B.
 * Map order follows first appearance (Base, then A, then B); callers must
 * not rely on it for output ordering.
 */
export function classify(baseUnits: Unit[], aUnits: Unit[], bUnits: Unit[]): VerdictMap {
  const base = indexByKey(baseUnits);
  const a = indexByKey(aUnits);
  const b = indexByKey(bUnits);

  const verdicts: VerdictMap = new Map();
  for (const unit of [...baseUnits, ...aUnits, ...bUnits]) {
    if (verdicts.has(unit.key)) continue;
    const baseUnit = base.get(unit.key);
    const aUnit = a.get(unit.key);
    const bUnit = b.get(unit.key);

    const verdict: Verdict = {
      key: unit.key,
      kind: (baseUnit ?? aUnit ?? unit).kind,
      verdict: classifyKey(baseUnit, aUnit, bUnit),
    };
    if (baseUnit) verdict.base = baseUnit;
    if (aUnit) verdict.a = aUnit;
    if (bUnit) verdict.b = bUnit;
    verdicts.set(unit.key, verdict);
  }

  return verdicts;
}
