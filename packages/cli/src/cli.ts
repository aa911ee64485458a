#!/usr/bin/env node
/**
 * remote-exec CLI entry point.
 */

import { buildProgram } from './program.js';

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  });
