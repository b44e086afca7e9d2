/**
 * Merge engine errors. Only these abort a file's merge; everything the
 * reconciler decides per unit is reported as data, not thrown.
 */

import type { SnapshotLabel } from './shared.js';

/** The grammar parser rejected one of the three snapshots. */
export class ParseFailure extends Error {
  readonly label: SnapshotLabel;
  readonly path: string;
  /** 1-based line of the first error node. */
  readonly line: number;

  constructor(label: SnapshotLabel, path: string, line: number) {
    super(`Failed to parse ${label} version of ${path} (line ${line})`);
    this.name = 'ParseFailure';
    this.label = label;
    this.path = path;
    this.line = line;
  }
}

export class UnsupportedLanguageError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`No grammar wired for ${path}`);
    this.name = 'UnsupportedLanguageError';
    this.path = path;
  }
}

export class ParserUnavailableError extends Error {
  constructor(detail: string) {
    super(`@ast-grep/napi could not be loaded: ${detail}`);
    this.name = 'ParserUnavailableError';
  }
}

export function isParseFailure(error: unknown): error is ParseFailure {
  return error instanceof ParseFailure;
}
