#!/usr/bin/env node
/**
 * hookd CLI entry point.
 */

import { errorMessage } from '@hookd/utils';
import { createProgram } from './program.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`hookd: ${errorMessage(err)}`);
    process.exit(1);
  });
