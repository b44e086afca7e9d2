/**
 * Repository merge tests — covers repository/index.ts with an in-memory
 * git reader and the real TypeScript grammar.
 */

import { describe, it, expect, beforeAll } from 'vitest';
import type { Logger } from '../logger.js';
import { ParseFailure } from '../merge/errors.js';
import { loadAstGrep, type AstGrepModule } from '../merge/parser.js';
import {
  listCandidateFiles,
  mapWithConcurrency,
  mergeRepository,
  type RepositoryGit,
} from '../repository/index.js';

let astGrep: AstGrepModule;

beforeAll(async () => {
  astGrep = await loadAstGrep();
});

// ---------------------------------------------------------------------------
// Fakes
// ---------------------------------------------------------------------------

type Tree = Record<string, string>;

function createFakeGit(refs: Record<string, Tree>, baseRef = 'base'): RepositoryGit & { reads: string[] } {
  const reads: string[] = [];
  return {
    reads,
    async mergeBase() {
      return `${baseRef}\n`;
    },
    async listFiles(ref: string) {
      return Object.keys(refs[ref] ?? {});
    },
    async readBlob(ref: string, filePath: string) {
      reads.push(`${ref}:${filePath}`);
      return refs[ref]?.[filePath] ?? null;
    },
  };
}

function createCollectingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    debug: () => {},
    info: () => {},
    warn: (msg: string) => { warnings.push(msg); },
    error: () => {},
  };
}

const lines = (...parts: string[]) => `${parts.join('\n')}\n`;

const USER_BASE = lines('export function greet(name: string): string {', '  return "Hello " + name;', '}');
const USER_A = lines('export function greet(person: string): string {', '  return "Hello " + person;', '}');
const USER_B = lines('export function greet(name: string): string {', '  return "Hi " + name;', '}');
const USER_B_CONFLICT = lines('export function greet(name: string): string {', '  return "Hey " + name.trim();', '}');
const USER_A_CONFLICT = lines('export function greet(name: string): string {', '  return "Yo " + name;', '}');
const OLD = lines('export const legacy = true;');

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('mapWithConcurrency', () => {
  it('keeps input order and respects the limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await mapWithConcurrency([30, 10, 20, 0], 2, async (ms) => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await new Promise(resolve => setTimeout(resolve, ms));
      inFlight--;
      return ms * 2;
    });

    expect(results).toEqual([60, 20, 40, 0]);
    expect(peak).toBe(2);
  });

  it('handles an empty list', async () => {
    expect(await mapWithConcurrency([], 4, async (x: number) => x)).toEqual([]);
  });
});

describe('listCandidateFiles', () => {
  it('unions every ref and filters by extension', async () => {
    const git = createFakeGit({
      base: { 'src/b.ts': '', 'README.md': '' },
      a: { 'src/a.tsx': '', 'src/b.ts': '' },
      b: { 'src/c.js': '' },
    });
    expect(await listCandidateFiles(git, ['base', 'a', 'b'], ['.ts', '.tsx'])).toEqual(['src/a.tsx', 'src/b.ts']);
  });
});

describe('mergeRepository', () => {
  it('merges each file, records deletions and isolates parse failures', async () => {
    const git = createFakeGit({
      base: { 'src/user.ts': USER_BASE, 'src/old.ts': OLD, 'src/broken.ts': OLD, 'README.md': '# notes\n' },
      'feature-a': {
        'src/user.ts': USER_A,
        'src/old.ts': OLD,
        'src/new.ts': lines('export const added = 1;'),
        'src/broken.ts': OLD,
        'README.md': '# changed\n',
      },
      'feature-b': { 'src/user.ts': USER_B, 'src/broken.ts': 'export const = = ;\n}}}', 'README.md': '# notes\n' },
    });
    const logger = createCollectingLogger();

    const result = await mergeRepository({ git, astGrep, logger }, { refA: 'feature-a', refB: 'feature-b' });

    expect(result.baseRef).toBe('base');
    expect([...result.files.keys()]).toEqual(['src/new.ts', 'src/old.ts', 'src/user.ts']);

    const user = result.files.get('src/user.ts');
    expect(user?.status).toBe('merged');
    expect(user?.outputName).toBe('src__user.ts');
    expect(user?.outcome.buffer).toBe(lines('export function greet(person: string): string {', '  return "Hi " + person;', '}'));

    expect(result.files.get('src/new.ts')?.status).toBe('merged');
    expect(result.files.get('src/new.ts')?.outcome.buffer).toBe(lines('export const added = 1;'));
    expect(result.files.get('src/old.ts')?.status).toBe('deleted');
    expect(result.files.get('src/old.ts')?.outcome.buffer).toBe('');

    expect(result.failures.map(f => f.path)).toEqual(['src/broken.ts']);
    const failure = result.failures[0]?.error;
    expect(failure).toBeInstanceOf(ParseFailure);
    if (failure instanceof ParseFailure) expect(failure.label).toBe('b');
    expect(logger.warnings).toHaveLength(1);

    expect(result.report.size).toBe(0);
    expect(git.reads.some(r => r.endsWith('README.md'))).toBe(false);
  });

  it('collects conflicts into the report', async () => {
    const git = createFakeGit({
      base: { 'src/user.ts': USER_BASE },
      a: { 'src/user.ts': USER_A_CONFLICT },
      b: { 'src/user.ts': USER_B_CONFLICT },
    });

    const result = await mergeRepository(
      { git, astGrep, logger: createCollectingLogger() },
      { refA: 'a', refB: 'b', concurrency: 1 },
    );

    expect(result.files.get('src/user.ts')?.status).toBe('conflicted');
    expect(result.files.get('src/user.ts')?.outcome.buffer).toBe(USER_BASE);
    expect(result.report.paths()).toEqual(['src/user.ts']);
    expect(result.report.get('src/user.ts', 'function:greet')?.reason).toBe('incompatible-edit');
  });

  it('only considers the configured extensions', async () => {
    const git = createFakeGit({
      base: { 'src/a.ts': OLD, 'src/b.tsx': OLD },
      a: { 'src/a.ts': OLD, 'src/b.tsx': OLD },
      b: { 'src/a.ts': OLD, 'src/b.tsx': OLD },
    });

    const result = await mergeRepository(
      { git, astGrep, logger: createCollectingLogger() },
      { refA: 'a', refB: 'b', extensions: ['.tsx'] },
    );
    expect([...result.files.keys()]).toEqual(['src/b.tsx']);
  });
});
