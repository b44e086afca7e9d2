/**
 * Command tree shared by the bin entry point and the command tests.
 */

import { Command } from 'commander';
import { registerFileCommand } from './commands/file.js';
import { registerMergeCommand } from './commands/merge.js';
import { registerUnitsCommand } from './commands/units.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('structmerge')
    .description('Structural three-way merge for TypeScript sources')
    .version('0.1.0');

  registerMergeCommand(program);
  registerFileCommand(program);
  registerUnitsCommand(program);

  return program;
}
