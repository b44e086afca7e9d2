/**
 * Per-file three-way merge pipeline:
 * extract ×3 → classify → reconcile (+ import unification) → splice.
 *
 * Every stage is a pure function of its inputs, so files can be merged
 * concurrently without coordination.
 */

import { alignAnonymousUnits } from './align.js';
import { classify } from './classify.js';
import { extractUnits } from './extract.js';
import { unifyImports } from './imports.js';
import { parseSnapshot, type AstGrepModule } from './parser.js';
import { reconcile, type ReconcileStrategy } from './reconcile.js';
import { emptySummary, type MergeOutcome, type Resolution, type Snapshot, type SnapshotLabel } from './shared.js';
import { splice, type ConflictRenderer } from './splice.js';

export * from './shared.js';
export * from './errors.js';
export * from './parser.js';
export { extractUnits, isAnonymousKey, ANONYMOUS_KEY_PREFIX } from './extract.js';
export { classify } from './classify.js';
export { alignAnonymousUnits } from './align.js';
export { reconcile, MODIFIED_BOTH_STRATEGIES, type ReconcileStrategy, type ReconcileOptions } from './reconcile.js';
export { reconcileParameterRename, occurrencesUntouched, tokenize } from './rename.js';
export { unifyImports, normalizeImportLine } from './imports.js';
export { splice, placeAdditions, renderConflictMarkers, type ConflictRenderer, type SpliceInput } from './splice.js';
export { ConflictReport, formatConflictLines, type ConflictReportJson } from './report.js';

export interface MergeDeps {
  astGrep: AstGrepModule;
}

export interface MergeFileInput {
  path: string;
  base: string;
  a: string;
  b: string;
  renderConflict?: ConflictRenderer;
  strategies?: readonly ReconcileStrategy[];
}

/** Parse and extract one snapshot. An empty source has no units. */
export function extractSnapshot(
  astGrep: AstGrepModule,
  source: string,
  path: string,
  label: SnapshotLabel,
): Snapshot {
  if (source.trim() === '') return { label, source, units: [] };
  return { label, source, units: extractUnits(parseSnapshot(astGrep, source, path, label)) };
}

/**
 * Merge three versions of one file. Throws ParseFailure when any version
 * fails to parse; per-unit conflicts are returned in the outcome.
 */
export function mergeFile(deps: MergeDeps, input: MergeFileInput): MergeOutcome {
  const { path } = input;
  const base = extractSnapshot(deps.astGrep, input.base, path, 'base');
  const a = extractSnapshot(deps.astGrep, input.a, path, 'a');
  const b = extractSnapshot(deps.astGrep, input.b, path, 'b');

  // Positional keys are only meaningful relative to Base.
  const aUnits = alignAnonymousUnits(base.units, a.units);
  const bUnits = alignAnonymousUnits(base.units, b.units);

  const verdicts = classify(base.units, aUnits, bUnits);

  const summary = emptySummary();
  const resolutions = new Map<string, Resolution>();
  const caveats: string[] = [];
  for (const verdict of verdicts.values()) {
    summary[verdict.verdict]++;
    if (verdict.kind === 'import') continue;
    if ([verdict.base, verdict.a, verdict.b].some(u => u?.ambiguous === true)) {
      caveats.push(verdict.key);
    }
    const resolution = reconcile(verdict, { path, strategies: input.strategies });
    if (resolution) resolutions.set(verdict.key, resolution);
  }

  const imports = unifyImports(verdicts);
  const buffer = splice({
    base: base.units,
    a: aUnits,
    b: bUnits,
    resolutions,
    imports,
    renderConflict: input.renderConflict,
  });

  const conflicts = [...resolutions.values()].flatMap(r => (r.status === 'conflict' ? [r.conflict] : []));
  return { path, buffer, conflicts, caveats, summary };
}

/**
 * Output file name for a repository-relative path: every path separator
 * becomes a double underscore.
 */
export function flattenOutputPath(filePath: string): string {
  return filePath.replace(/[\\/]/g, '__');
}
