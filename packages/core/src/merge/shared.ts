/**
 * Merge engine shared types — units, verdicts, resolutions and conflict
 * records passed between the extractor, classifier, reconciler and splicer.
 *
 * No filesystem, git, or child_process I/O.
 */

import { createHash } from 'node:crypto';

// ---------------------------------------------------------------------------
// Units
// ---------------------------------------------------------------------------

export type UnitKind = 'function' | 'class' | 'variable' | 'type' | 'import' | 'statement';

/** An identifier occurrence, with offsets relative to the owning unit's text. */
export interface Occurrence {
  name: string;
  start: number;
  end: number;
}

/** Extra structure kept for function units (rename heuristic input). */
export interface FunctionSignature {
  /** First declared parameter, when it is a plain identifier. */
  firstParam: Occurrence | null;
  /** Every `identifier` node inside the unit, in source order. */
  identifiers: Occurrence[];
  /** Shorthand properties and patterns (`{ name }`), which bind and read a name at once. */
  shorthands: Occurrence[];
}

/**
 * A top-level declaration extracted from one snapshot.
 * `start`/`end` form a half-open range into the snapshot's source.
 */
export interface Unit {
  kind: UnitKind;
  key: string;
  /** Declared name (module specifier for imports), null when unknown. */
  name: string | null;
  start: number;
  end: number;
  text: string;
  hash: string;
  /** True when `key` is a positional fallback rather than a name. */
  ambiguous: boolean;
  signature?: FunctionSignature;
}

export type SnapshotLabel = 'base' | 'a' | 'b';

export interface Snapshot {
  label: SnapshotLabel;
  source: string;
  units: Unit[];
}

// ---------------------------------------------------------------------------
// Verdicts
// ---------------------------------------------------------------------------

export type VerdictKind =
  | 'unchanged'
  | 'added-A'
  | 'added-B'
  | 'added-both'
  | 'removed-A'
  | 'removed-B'
  | 'removed-both'
  | 'modified-A'
  | 'modified-B'
  | 'modified-both';

/** Classification of one identity key. Units are shared references, never copies. */
export interface Verdict {
  key: string;
  kind: UnitKind;
  verdict: VerdictKind;
  base?: Unit;
  a?: Unit;
  b?: Unit;
}

export type VerdictMap = Map<string, Verdict>;

// ---------------------------------------------------------------------------
// Resolutions and conflicts
// ---------------------------------------------------------------------------

export type ConflictReason = 'incompatible-edit' | 'delete-modify' | 'ambiguous-identity';

export interface ConflictRecord {
  path: string;
  key: string;
  reason: ConflictReason;
  baseText: string | null;
  aText: string | null;
  bText: string | null;
  /** Set when a unit involved had no determinable name. */
  lowConfidence: boolean;
}

export type ResolutionStrategy =
  | 'base'
  | 'side-a'
  | 'side-b'
  | 'convergent'
  | 'rename-parameter';

export type Resolution =
  | { status: 'resolved'; key: string; text: string; strategy: ResolutionStrategy }
  | { status: 'conflict'; key: string; conflict: ConflictRecord };

export interface MergeOutcome {
  path: string;
  buffer: string;
  /** Empty when the file merged cleanly. */
  conflicts: ConflictRecord[];
  /** Keys whose identity came from a positional fallback. */
  caveats: string[];
  summary: Record<VerdictKind, number>;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Normalize insignificant whitespace: CRLF to LF, trailing whitespace per
 * line, and leading/trailing blank space of the whole text.
 */
export function normalizeUnitText(text: string): string {
  return text
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map(line => line.replace(/[ \t]+$/, ''))
    .join('\n')
    .trim();
}

export function hashUnitText(text: string): string {
  return createHash('sha256').update(normalizeUnitText(text)).digest('hex');
}

/** Replace each occurrence span in `text` with `replacement`. Spans must not overlap. */
export function substituteOccurrences(
  text: string,
  occurrences: Occurrence[],
  replacement: string,
): string {
  const sorted = [...occurrences].sort((x, y) => x.start - y.start);
  let out = '';
  let cursor = 0;
  for (const occ of sorted) {
    out += text.slice(cursor, occ.start) + replacement;
    cursor = occ.end;
  }
  return out + text.slice(cursor);
}

export function emptySummary(): Record<VerdictKind, number> {
  return {
    'unchanged': 0,
    'added-A': 0,
    'added-B': 0,
    'added-both': 0,
    'removed-A': 0,
    'removed-B': 0,
    'removed-both': 0,
    'modified-A': 0,
    'modified-B': 0,
    'modified-both': 0,
  };
}
