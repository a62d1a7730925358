#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * vmerger <inputs...> [options]
 */

import { config as dotenvConfig } from 'dotenv';
import { loadConfig } from './config/index.js';
import { mergeCommand } from './commands/merge.js';
import { printErrorChain } from './lib/output.js';
import { createProgram } from './program.js';

dotenvConfig();

const program = createProgram(async (inputFiles, options) => {
  const loaded = loadConfig();
  if (!loaded.success) {
    printErrorChain(loaded.error);
    process.exitCode = 1;
    return;
  }

  process.exitCode = await mergeCommand(inputFiles, options, { config: loaded.data });
});

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  process.exit(err.exitCode);
});

// Parse and execute
program.parseAsync().catch((error: unknown) => {
  printErrorChain(error);
  process.exit(1);
});
