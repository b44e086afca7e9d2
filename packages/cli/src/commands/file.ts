/**
 * File command: merge three local versions of one file.
 */

import * as fs from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { formatConflictLines, mergeFile, renderConflictMarkers, type MergeOutcome } from '@structmerge/core';
import { exitCommand, exitCommandError, loadAstGrepOrExit } from '../lib/command-runtime.js';
import { writeFileAtomic } from '../lib/output-writer.js';

export function readSourceOrExit(filePath: string, json?: boolean): string {
  if (!fs.existsSync(filePath)) {
    exitCommandError({ json, message: `File not found: ${filePath}` });
  }
  return fs.readFileSync(filePath, 'utf-8');
}

export function registerFileCommand(program: Command): void {
  program
    .command('file <base> <a> <b>')
    .description('Merge three local versions of a file; the grammar is chosen from <a>')
    .option('-o, --out <file>', 'Write the merged file here instead of stdout')
    .option('--markers', 'Write conflict markers for conflicted units instead of the base text')
    .option('--json', 'Print the outcome as JSON')
    .action(async (basePath: string, aPath: string, bPath: string, options: { out?: string; markers?: boolean; json?: boolean }) => {
      const base = readSourceOrExit(basePath, options.json);
      const a = readSourceOrExit(aPath, options.json);
      const b = readSourceOrExit(bPath, options.json);
      const astGrep = await loadAstGrepOrExit({ json: options.json });

      let outcome: MergeOutcome;
      try {
        outcome = mergeFile({ astGrep }, {
          path: aPath,
          base,
          a,
          b,
          renderConflict: options.markers ? renderConflictMarkers : undefined,
        });
      } catch (err) {
        if (!(err instanceof Error)) throw err;
        exitCommandError({ json: options.json, message: err.message });
      }

      if (options.out) {
        writeFileAtomic(options.out, outcome.buffer);
      }

      if (options.json) {
        console.log(JSON.stringify({
          success: outcome.conflicts.length === 0,
          buffer: options.out ? undefined : outcome.buffer,
          conflicts: outcome.conflicts,
          caveats: outcome.caveats,
          summary: outcome.summary,
        }, null, 2));
      } else {
        if (!options.out) process.stdout.write(outcome.buffer);
        for (const line of formatConflictLines(outcome.conflicts)) {
          console.error(chalk.yellow(line));
        }
      }

      if (outcome.conflicts.length > 0) {
        exitCommand(1);
      }
    });
}
