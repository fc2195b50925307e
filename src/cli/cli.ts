#!/usr/bin/env node
/**
 * kube-deploy CLI entry point
 */

import { argv } from 'node:process';
import { createProgram } from './program';

createProgram()
  .parseAsync(argv)
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
