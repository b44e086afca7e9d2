#!/usr/bin/env node
/**
 * structmerge CLI entry point.
 */

import { isCommandRuntimeError, renderCommandRuntimeError } from '../lib/command-runtime.js';
import { createProgram } from '../program.js';

createProgram().parseAsync(process.argv).catch((err: unknown) => {
  if (isCommandRuntimeError(err)) {
    renderCommandRuntimeError(err);
    process.exitCode = err.exitCode;
    return;
  }
  console.error(err);
  process.exitCode = 1;
});
