#!/usr/bin/env node
import { loadLoggingFromEnv } from '@dojo-trainer/engine';
import { createProgram } from './program.js';

loadLoggingFromEnv();

createProgram()
  .parseAsync()
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  });
