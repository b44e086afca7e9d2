/**
 * First-parameter rename reconciliation.
 *
 * Handles exactly one shape of modified-both function: one side renamed
 * the first parameter and changed nothing else, the other side edited the
 * function without touching any occurrence of that parameter. The editing
 * side's text is kept and the old name is replaced at its identifier
 * occurrences.
 */

import { diffArrays } from 'diff';
import { substituteOccurrences, type Occurrence, type Unit } from './shared.js';

// ---------------------------------------------------------------------------
// Token diff
// ---------------------------------------------------------------------------

interface Token {
  value: string;
  start: number;
  end: number;
}

const TOKEN_PATTERN = /[A-Za-z_$][\w$]*|\d+|\s+|[^\s\w$]/g;

export function tokenize(text: string): Token[] {
  const tokens: Token[] = [];
  for (const match of text.matchAll(TOKEN_PATTERN)) {
    const start = match.index ?? 0;
    tokens.push({ value: match[0], start, end: start + match[0].length });
  }
  return tokens;
}

/**
 * Mark which tokens of `before` survive unchanged into `after`.
 * Returns one flag per `before` token.
 */
function survivingTokens(beforeTokens: Token[], after: string): boolean[] {
  const kept = new Array<boolean>(beforeTokens.length).fill(false);
  const changes = diffArrays(
    beforeTokens.map(t => t.value),
    tokenize(after).map(t => t.value),
  );

  let index = 0;
  for (const change of changes) {
    if (change.added) continue;
    const count = change.value.length;
    if (!change.removed) {
      for (let i = index; i < index + count; i++) kept[i] = true;
    }
    index += count;
  }
  return kept;
}

/** True when every occurrence span in `before` lies in tokens that `after` kept. */
export function occurrencesUntouched(before: string, after: string, occurrences: Occurrence[]): boolean {
  const tokens = tokenize(before);
  const kept = survivingTokens(tokens, after);
  return occurrences.every(occ =>
    tokens.every((token, i) => token.end <= occ.start || token.start >= occ.end || kept[i]),
  );
}

// ---------------------------------------------------------------------------
// Heuristic
// ---------------------------------------------------------------------------

function occurrencesOf(unit: Unit, name: string): Occurrence[] {
  return (unit.signature?.identifiers ?? []).filter(occ => occ.name === name);
}

function mentions(unit: Unit, name: string): boolean {
  return occurrencesOf(unit, name).length > 0;
}

/**
 * Try to reconcile a first-parameter rename on `renamer` with an unrelated
 * edit on `editor`. Returns the merged text, or null when the shape does
 * not match (the caller then reports a conflict).
 */
export function reconcileParameterRename(base: Unit, renamer: Unit, editor: Unit): string | null {
  if (base.kind !== 'function' || renamer.kind !== 'function' || editor.kind !== 'function') return null;
  if (base.ambiguous || renamer.ambiguous || editor.ambiguous) return null;

  const baseParam = base.signature?.firstParam;
  const renamedParam = renamer.signature?.firstParam;
  const editorParam = editor.signature?.firstParam;
  if (!baseParam || !renamedParam || !editorParam) return null;

  const oldName = baseParam.name;
  const newName = renamedParam.name;
  if (oldName === newName) return null;

  // `{ name }` cannot be renamed by substitution alone.
  const shorthandUse = (unit: Unit) =>
    (unit.signature?.shorthands ?? []).some(occ => occ.name === oldName || occ.name === newName);
  if (shorthandUse(base) || shorthandUse(renamer) || shorthandUse(editor)) return null;

  // The new name must not capture an existing binding on either side.
  if (mentions(base, newName) || mentions(editor, newName)) return null;

  // Renamer: substituting the name in Base must reproduce it byte for byte.
  const baseOccurrences = occurrencesOf(base, oldName);
  if (substituteOccurrences(base.text, baseOccurrences, newName) !== renamer.text) return null;

  // Editor: parameter still named the same, and no Base occurrence touched.
  if (editorParam.name !== oldName) return null;
  if (!occurrencesUntouched(base.text, editor.text, baseOccurrences)) return null;

  return substituteOccurrences(editor.text, occurrencesOf(editor, oldName), newName);
}
