import chalk from 'chalk';
import { loadAstGrep, type AstGrepModule } from '@structmerge/core';
import { createGitService } from './git.js';

interface ExitCommandErrorOptions {
  json?: boolean;
  message: string;
  exitCode?: number;
  humanDetails?: string[];
  render?: boolean;
}

export class CommandRuntimeError extends Error {
  readonly json: boolean;
  readonly exitCode: number;
  readonly humanDetails?: string[];
  readonly render: boolean;

  constructor(options: ExitCommandErrorOptions) {
    super(options.message);
    this.name = 'CommandRuntimeError';
    this.json = options.json ?? false;
    this.exitCode = options.exitCode ?? 1;
    this.humanDetails = options.humanDetails;
    this.render = options.render ?? true;
  }
}

export function isCommandRuntimeError(error: unknown): error is CommandRuntimeError {
  return error instanceof CommandRuntimeError;
}

export function renderCommandRuntimeError(error: CommandRuntimeError): void {
  if (!error.render) {
    return;
  }

  if (error.json) {
    console.log(JSON.stringify({ success: false, error: error.message }));
    return;
  }

  console.error(chalk.red(`✗ ${error.message}`));
  for (const detail of error.humanDetails ?? []) {
    console.error(detail);
  }
}

export function exitCommandError(options: ExitCommandErrorOptions): never {
  throw new CommandRuntimeError(options);
}

export function exitCommand(exitCode = 0, message?: string): never {
  throw new CommandRuntimeError({
    message: message ?? `Command exited with code ${exitCode}`,
    exitCode,
    render: false,
  });
}

interface ResolveRepoRootOptions {
  cwd?: string;
  json?: boolean;
}

export async function resolveRepoRootOrExit(options: ResolveRepoRootOptions = {}): Promise<string> {
  const git = createGitService();
  const cwd = options.cwd ?? process.cwd();
  const repoRoot = await git.findRepoRoot(cwd);

  if (!repoRoot) {
    exitCommandError({
      json: options.json,
      message: 'Not a git repository',
      humanDetails: [chalk.gray(`  ${cwd}`)],
    });
  }

  return repoRoot;
}

export async function loadAstGrepOrExit(options: { json?: boolean } = {}): Promise<AstGrepModule> {
  try {
    return await loadAstGrep();
  } catch (err) {
    exitCommandError({
      json: options.json,
      message: err instanceof Error ? err.message : String(err),
      humanDetails: [chalk.gray('  Install it with: npm install @ast-grep/napi')],
    });
  }
}
