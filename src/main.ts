#!/usr/bin/env node
import { runCLI } from './cli/index.js';

runCLI().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
