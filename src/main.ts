#!/usr/bin/env node
// Executable entrypoint

import { program } from './cli';

program.parseAsync().catch((error: unknown) => {
  console.error('Supervisor failed:', error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
