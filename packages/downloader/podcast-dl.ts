#!/usr/bin/env tsx

import { runCli } from './cli.js';

runCli(process.argv.slice(2)).then(
  exitCode => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error(error);
    process.exitCode = 1;
  }
);
