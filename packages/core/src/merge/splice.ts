/**
 * Splicing — lays resolved unit texts out in Base order, with the unified
 * import block hoisted first and additions placed after their anchor.
 *
 * Units are separated by exactly one blank line; Base's own inter-unit
 * whitespace is not kept.
 */

import type { ConflictRecord, Resolution, Unit } from './shared.js';

export type ConflictRenderer = (record: ConflictRecord) => string | null;

export interface SpliceInput {
  base: Unit[];
  a: Unit[];
  b: Unit[];
  resolutions: Map<string, Resolution>;
  imports: string[];
  /** Text emitted for a conflicted unit. Defaults to the Base text, or nothing. */
  renderConflict?: ConflictRenderer;
}

/**
 * The nearest non-import unit before `index` in `units` that also exists
 * in Base, or null when the unit leads its side.
 */
function anchorOf(units: Unit[], index: number, baseKeys: Set<string>): string | null {
  for (let i = index - 1; i >= 0; i--) {
    const unit = units[i];
    if (unit.kind !== 'import' && baseKeys.has(unit.key)) return unit.key;
  }
  return null;
}

/**
 * Group added keys by anchor. A's additions come before B's under the
 * same anchor; a key added on both sides is placed by A's sequence.
 */
export function placeAdditions(base: Unit[], a: Unit[], b: Unit[]): Map<string | null, string[]> {
  const baseKeys = new Set(base.map(u => u.key));
  const placed = new Set<string>();
  const additions = new Map<string | null, string[]>();

  for (const side of [a, b]) {
    side.forEach((unit, index) => {
      if (unit.kind === 'import' || baseKeys.has(unit.key) || placed.has(unit.key)) return;
      placed.add(unit.key);
      const anchor = anchorOf(side, index, baseKeys);
      const group = additions.get(anchor) ?? [];
      group.push(unit.key);
      additions.set(anchor, group);
    });
  }

  return additions;
}

export function renderConflictMarkers(record: ConflictRecord): string {
  const section = (text: string | null) => (text === null ? [] : [text]);
  return [
    '<<<<<<< a',
    ...section(record.aText),
    '||||||| base',
    ...section(record.baseText),
    '=======',
    ...section(record.bText),
    '>>>>>>> b',
  ].join('\n');
}

export function splice(input: SpliceInput): string {
  const { resolutions, renderConflict } = input;
  const sections: string[] = [];

  if (input.imports.length > 0) {
    sections.push(input.imports.join('\n'));
  }

  const emit = (key: string) => {
    const resolution = resolutions.get(key);
    if (!resolution) return;
    const text = resolution.status === 'resolved'
      ? resolution.text
      : renderConflict
        ? renderConflict(resolution.conflict)
        : resolution.conflict.baseText;
    if (text) sections.push(text);
  };

  const additions = placeAdditions(input.base, input.a, input.b);
  for (const key of additions.get(null) ?? []) emit(key);
  for (const unit of input.base) {
    if (unit.kind === 'import') continue;
    emit(unit.key);
    for (const key of additions.get(unit.key) ?? []) emit(key);
  }

  return sections.length > 0 ? `${sections.join('\n\n')}\n` : '';
}
