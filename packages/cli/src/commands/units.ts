/**
 * Units command: print the units extracted from one file as JSON.
 */

import { Command } from 'commander';
import { extractSnapshot } from '@structmerge/core';
import { exitCommandError, loadAstGrepOrExit } from '../lib/command-runtime.js';
import { readSourceOrExit } from './file.js';

export function registerUnitsCommand(program: Command): void {
  program
    .command('units <file>')
    .description('Print the merge units extracted from a file')
    .action(async (filePath: string) => {
      const source = readSourceOrExit(filePath, true);
      const astGrep = await loadAstGrepOrExit({ json: true });

      try {
        const snapshot = extractSnapshot(astGrep, source, filePath, 'base');
        const units = snapshot.units.map(u => ({
          kind: u.kind,
          key: u.key,
          name: u.name,
          start: u.start,
          end: u.end,
          hash: u.hash,
          ambiguous: u.ambiguous,
        }));
        console.log(JSON.stringify({ path: filePath, units }, null, 2));
      } catch (err) {
        if (!(err instanceof Error)) throw err;
        exitCommandError({ json: true, message: err.message });
      }
    });
}
