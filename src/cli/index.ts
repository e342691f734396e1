#!/usr/bin/env node

import { createProgram } from './cli.js';
import { reportCommandError } from './utils/errors.js';

createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    reportCommandError(error);
  });
