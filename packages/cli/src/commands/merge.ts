/**
 * Merge command: structurally merge two refs of a repository against their
 * merge base and write the results to the output directory.
 */

import * as path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { mergeRepository, renderConflictMarkers, type RepositoryMergeResult } from '@structmerge/core';
import { exitCommand, exitCommandError, loadAstGrepOrExit, resolveRepoRootOrExit } from '../lib/command-runtime.js';
import { applyOverrides, ConfigError, getConfigPath, loadConfig, type MergeConfig } from '../lib/config.js';
import { createGitService } from '../lib/git.js';
import { createLogger, silentLogger } from '../lib/logger.js';
import { writeMergeResult } from '../lib/output-writer.js';

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

export function loadConfigOrExit(configPath: string, json?: boolean): MergeConfig {
  try {
    return loadConfig(configPath);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    exitCommandError({ json, message: err.message });
  }
}

interface MergeCommandOptions {
  out?: string;
  markers?: boolean;
  json?: boolean;
  verbose?: boolean;
  concurrency?: number;
  config?: string;
}

export function registerMergeCommand(program: Command): void {
  program
    .command('merge <repo> <refA> <refB>')
    .description('Merge two refs unit by unit against their merge base')
    .option('-o, --out <dir>', 'Output directory (default: .structmerge/out)')
    .option('--markers', 'Write conflict markers for conflicted units instead of the base text')
    .option('--concurrency <n>', 'Files merged in parallel', parsePositiveInt)
    .option('--config <path>', 'Config file (default: <repo>/.structmerge/config.json)')
    .option('--json', 'Print the result as JSON')
    .option('-v, --verbose', 'Show debug output')
    .action(async (repo: string, refA: string, refB: string, options: MergeCommandOptions) => {
      const repoRoot = await resolveRepoRootOrExit({ cwd: path.resolve(repo), json: options.json });
      const fileConfig = loadConfigOrExit(options.config ?? getConfigPath(repoRoot), options.json);
      const config = applyOverrides(fileConfig, {
        outDir: options.out,
        concurrency: options.concurrency,
        conflictMarkers: options.markers,
      });
      const outDir = path.resolve(repoRoot, config.outDir);

      const logger = options.json ? silentLogger : createLogger({ verbose: options.verbose });
      const astGrep = await loadAstGrepOrExit({ json: options.json });
      const git = createGitService(repoRoot);

      let result: RepositoryMergeResult;
      try {
        result = await mergeRepository({ git, astGrep, logger }, {
          refA,
          refB,
          extensions: config.extensions,
          concurrency: config.concurrency,
          renderConflict: config.conflictMarkers ? renderConflictMarkers : undefined,
        });
      } catch (err) {
        if (!(err instanceof Error)) throw err;
        exitCommandError({
          json: options.json,
          message: `Could not merge ${refA} and ${refB}: ${err.message.trim()}`,
        });
      }

      const written = writeMergeResult(result, outDir);
      const conflicted = written.written.filter(w => w.status === 'conflicted');

      if (options.json) {
        console.log(JSON.stringify({
          success: conflicted.length === 0 && result.failures.length === 0,
          baseRef: result.baseRef,
          outDir,
          files: written.written.map(w => ({
            path: w.path,
            status: w.status,
            output: w.outputPath,
            conflicts: result.report.forPath(w.path).length,
          })),
          deleted: written.deleted,
          failures: result.failures.map(f => ({ path: f.path, error: f.error.message })),
          report: written.reportPath,
        }, null, 2));
      } else {
        for (const w of written.written) {
          if (w.status === 'merged') {
            console.log(chalk.green(`✓ ${w.path}`));
          } else {
            const count = result.report.forPath(w.path).length;
            console.log(chalk.yellow(`⚠ ${w.path}`) + chalk.gray(` (${count} conflict(s))`));
          }
        }
        for (const deleted of written.deleted) {
          console.log(chalk.gray(`- ${deleted} (deleted)`));
        }
        for (const failure of result.failures) {
          console.log(chalk.red(`✗ ${failure.path}`) + chalk.gray(` ${failure.error.message}`));
        }

        console.log();
        console.log(
          `${written.written.length - conflicted.length} merged, ` +
          `${conflicted.length} conflicted, ` +
          `${written.deleted.length} deleted, ` +
          `${result.failures.length} failed`,
        );
        console.log(chalk.gray(`Output: ${outDir}`));
      }

      if (conflicted.length > 0 || result.failures.length > 0) {
        exitCommand(1);
      }
    });
}
