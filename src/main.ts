#!/usr/bin/env node
import { EXIT_CODE_RUNTIME } from './errors';
import { run } from './program';

run(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error('Unexpected failure:', error);
    process.exitCode = EXIT_CODE_RUNTIME;
  }
);
