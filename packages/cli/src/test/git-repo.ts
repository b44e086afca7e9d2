/**
 * Throwaway git repositories for the git service and command tests.
 */

import { execFileSync } from 'node:child_process';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';

export interface TestRepo {
  root: string;
  git(...args: string[]): string;
  /** Write files relative to the root and commit them all. */
  commit(message: string, files: Record<string, string>): void;
  cleanup(): void;
}

export function createTestRepo(): TestRepo {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'structmerge-git-test-'));
  const git = (...args: string[]) => execFileSync('git', args, { cwd: root, encoding: 'utf-8' });

  git('init', '-q');
  return {
    root,
    git,
    commit(message, files) {
      for (const [file, content] of Object.entries(files)) {
        fs.mkdirSync(path.dirname(path.join(root, file)), { recursive: true });
        fs.writeFileSync(path.join(root, file), content);
      }
      git('add', '-A');
      git(
        '-c', 'user.name=test', '-c', 'user.email=test@example.com', '-c', 'commit.gpgsign=false',
        'commit', '-q', '-m', message,
      );
    },
    cleanup() {
      fs.rmSync(root, { recursive: true, force: true });
    },
  };
}

export const lines = (...parts: string[]) => `${parts.join('\n')}\n`;

export const ADD_BASE = lines('export function add(a: number, b: number): number {', '  return a + b;', '}');
export const SUB_BASE = lines('export function sub(a: number, b: number): number {', '  return a - b;', '}');
export const ADD_EDITED = lines('export function add(a: number, b: number): number {', '  return b + a;', '}');
export const SUB_EDITED = lines('export function sub(a: number, b: number): number {', '  return -(b - a);', '}');

/**
 * Base commit with `src/math.ts`, then `feature-a` editing `add` and
 * `feature-b` editing `sub`, both branched from it.
 */
export function createDivergedRepo(options: { bAdd?: string } = {}): TestRepo {
  const repo = createTestRepo();
  repo.commit('base', {
    'src/math.ts': `${ADD_BASE}\n${SUB_BASE}`,
    'README.md': 'notes\n',
  });
  repo.git('branch', 'feature-b');
  repo.git('checkout', '-q', '-b', 'feature-a');
  repo.commit('edit add', { 'src/math.ts': `${ADD_EDITED}\n${SUB_BASE}` });
  repo.git('checkout', '-q', 'feature-b');
  repo.commit('edit sub', { 'src/math.ts': `${options.bAdd ?? ADD_BASE}\n${SUB_EDITED}` });
  return repo;
}
