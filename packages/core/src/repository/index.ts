/**
 * Repository merge — runs the per-file pipeline over every candidate file
 * of two refs and their merge base.
 *
 * Git access is injected (RepositoryGit); this module does no I/O itself.
 */

import * as path from 'node:path';
import type { Logger } from '../logger.js';
import {
  ConflictReport,
  flattenOutputPath,
  isParseFailure,
  mergeFile,
  type AstGrepModule,
  type ConflictRenderer,
  type MergeOutcome,
} from '../merge/index.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RepositoryGit {
  mergeBase(refA: string, refB: string): Promise<string>;
  /** Repository-relative paths of every file at `ref`. */
  listFiles(ref: string): Promise<string[]>;
  /** File content at `ref`, or null when the path does not exist there. */
  readBlob(ref: string, filePath: string): Promise<string | null>;
}

export interface MergeRepositoryDeps {
  git: RepositoryGit;
  astGrep: AstGrepModule;
  logger: Logger;
}

export interface MergeRepositoryOptions {
  refA: string;
  refB: string;
  extensions?: string[];
  concurrency?: number;
  renderConflict?: ConflictRenderer;
}

export type FileMergeStatus = 'merged' | 'conflicted' | 'deleted';

export interface FileMergeEntry {
  path: string;
  outputName: string;
  status: FileMergeStatus;
  outcome: MergeOutcome;
}

export interface FileFailure {
  path: string;
  error: Error;
}

export interface RepositoryMergeResult {
  baseRef: string;
  files: Map<string, FileMergeEntry>;
  report: ConflictReport;
  failures: FileFailure[];
}

export const DEFAULT_EXTENSIONS = ['.ts', '.tsx'];
export const DEFAULT_CONCURRENCY = 8;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Map over items with at most `limit` promises in flight; results keep input order. */
export async function mapWithConcurrency<T, R>(
  items: T[],
  limit: number,
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const worker = async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index]);
    }
  };
  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker);
  await Promise.all(workers);
  return results;
}

/** Union of the files present at any of the refs, filtered by extension, sorted. */
export async function listCandidateFiles(
  git: RepositoryGit,
  refs: string[],
  extensions: string[],
): Promise<string[]> {
  const listed = await Promise.all(refs.map(ref => git.listFiles(ref)));
  const candidates = new Set<string>();
  for (const files of listed) {
    for (const file of files) {
      if (extensions.includes(path.extname(file))) candidates.add(file);
    }
  }
  return [...candidates].sort();
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

type FileResult =
  | { kind: 'entry'; entry: FileMergeEntry }
  | { kind: 'failure'; failure: FileFailure }
  | { kind: 'skipped' };

/**
 * Merge every candidate file of `refA` and `refB` against their merge base.
 * A file missing on one ref is merged as an empty snapshot. A file that
 * fails to parse is reported in `failures` and does not stop the others.
 */
export async function mergeRepository(
  deps: MergeRepositoryDeps,
  opts: MergeRepositoryOptions,
): Promise<RepositoryMergeResult> {
  const { git, logger } = deps;
  const { refA, refB } = opts;

  const baseRef = (await git.mergeBase(refA, refB)).trim();
  logger.debug('Resolved merge base', { refA, refB, baseRef });

  const files = await listCandidateFiles(git, [baseRef, refA, refB], opts.extensions ?? DEFAULT_EXTENSIONS);
  logger.info(`Merging ${files.length} file(s)`);

  const mergeOne = async (filePath: string): Promise<FileResult> => {
    try {
      const [base, a, b] = await Promise.all([
        git.readBlob(baseRef, filePath),
        git.readBlob(refA, filePath),
        git.readBlob(refB, filePath),
      ]);
      if (base === null && a === null && b === null) return { kind: 'skipped' };

      const outcome = mergeFile(deps, {
        path: filePath,
        base: base ?? '',
        a: a ?? '',
        b: b ?? '',
        renderConflict: opts.renderConflict,
      });

      const status: FileMergeStatus = outcome.conflicts.length > 0
        ? 'conflicted'
        : outcome.buffer === '' && (base ?? '').trim() !== ''
          ? 'deleted'
          : 'merged';
      logger.debug(`${filePath}: ${status}`, { summary: outcome.summary });

      return {
        kind: 'entry',
        entry: { path: filePath, outputName: flattenOutputPath(filePath), status, outcome },
      };
    } catch (err) {
      if (!(err instanceof Error)) throw err;
      if (isParseFailure(err)) {
        logger.warn(err.message, { label: err.label, line: err.line });
      } else {
        logger.warn(`${filePath}: ${err.message}`);
      }
      return { kind: 'failure', failure: { path: filePath, error: err } };
    }
  };

  const results = await mapWithConcurrency(files, opts.concurrency ?? DEFAULT_CONCURRENCY, mergeOne);

  const entries = new Map<string, FileMergeEntry>();
  const report = new ConflictReport();
  const failures: FileFailure[] = [];
  for (const result of results) {
    if (result.kind === 'entry') {
      entries.set(result.entry.path, result.entry);
      report.add(result.entry.outcome.conflicts);
    } else if (result.kind === 'failure') {
      failures.push(result.failure);
    }
  }

  return { baseRef, files: entries, report, failures };
}
