/**
 * Git access for the CLI — merge base, tree listings and blob reads,
 * shelled out to the git binary.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { RepositoryGit } from '@structmerge/core';

const execFileAsync = promisify(execFile);

export interface GitService extends RepositoryGit {
  findRepoRoot(cwd: string): Promise<string | null>;
}

/**
 * Async git command execution — does not block the event loop, so blob
 * reads for several files can be in flight at once.
 */
export async function gitExec(args: string[], opts: { cwd: string; maxBuffer?: number }): Promise<string> {
  const result = await execFileAsync('git', args, {
    cwd: opts.cwd,
    encoding: 'utf-8',
    maxBuffer: opts.maxBuffer ?? 10 * 1024 * 1024,
  });
  return result.stdout;
}

/** Parse `git ls-tree -r -z --name-only` output. */
export function parseLsTree(output: string): string[] {
  return output.split('\0').filter(Boolean);
}

export function createGitService(repoRoot = process.cwd()): GitService {
  const listings = new Map<string, Promise<Set<string>>>();

  const listFileSet = (ref: string): Promise<Set<string>> => {
    let listing = listings.get(ref);
    if (!listing) {
      listing = gitExec(['ls-tree', '-r', '-z', '--name-only', ref], { cwd: repoRoot })
        .then(out => new Set(parseLsTree(out)));
      listings.set(ref, listing);
    }
    return listing;
  };

  return {
    async findRepoRoot(cwd: string): Promise<string | null> {
      try {
        const out = await gitExec(['rev-parse', '--show-toplevel'], { cwd });
        return out.trim() || null;
      } catch {
        return null; // not inside a work tree
      }
    },

    async mergeBase(refA: string, refB: string): Promise<string> {
      return (await gitExec(['merge-base', refA, refB], { cwd: repoRoot })).trim();
    },

    async listFiles(ref: string): Promise<string[]> {
      return [...(await listFileSet(ref))];
    },

    async readBlob(ref: string, filePath: string): Promise<string | null> {
      const files = await listFileSet(ref);
      if (!files.has(filePath)) return null;
      return gitExec(['cat-file', 'blob', `${ref}:${filePath}`], { cwd: repoRoot });
    },
  };
}
