/**
 * Import unification — line-level union of the import units of all three
 * snapshots, hoisted above every other unit. Specifier lists are never
 * parsed or coalesced.
 */

import type { Unit, VerdictMap } from './shared.js';

/** Trim and collapse whitespace runs; the import's text is otherwise untouched. */
export function normalizeImportLine(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

function importsOf(verdicts: VerdictMap, side: 'base' | 'a' | 'b'): Unit[] {
  const units: Unit[] = [];
  for (const verdict of verdicts.values()) {
    const unit = verdict[side];
    if (unit && unit.kind === 'import') units.push(unit);
  }
  return units.sort((x, y) => x.start - y.start);
}

/**
 * Build the hoisted import lines.
 *
 * Order: Base imports that both sides kept (Base order), then imports new
 * on A (A order), then imports new on B (B order). An import removed on
 * either side is dropped; duplicates by normalized line keep the first.
 */
export function unifyImports(verdicts: VerdictMap): string[] {
  const baseImports = importsOf(verdicts, 'base');
  const aImports = importsOf(verdicts, 'a');
  const bImports = importsOf(verdicts, 'b');

  const lineSet = (units: Unit[]) => new Set(units.map(u => normalizeImportLine(u.text)));
  const baseLines = lineSet(baseImports);
  const aLines = lineSet(aImports);
  const bLines = lineSet(bImports);

  const out: string[] = [];
  const seen = new Set<string>();
  const keep = (unit: Unit) => {
    const line = normalizeImportLine(unit.text);
    if (seen.has(line)) return;
    seen.add(line);
    out.push(unit.text.trim());
  };

  for (const unit of baseImports) {
    const line = normalizeImportLine(unit.text);
    if (aLines.has(line) && bLines.has(line)) keep(unit);
  }
  for (const unit of aImports) {
    if (!baseLines.has(normalizeImportLine(unit.text))) keep(unit);
  }
  for (const unit of bImports) {
    if (!baseLines.has(normalizeImportLine(unit.text))) keep(unit);
  }

  return out;
}
