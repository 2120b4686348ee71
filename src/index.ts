#!/usr/bin/env node

// Entry point for term-reset
// Restores a terminal left in a broken mode by a full-screen application

import { resetTerminal } from './reset.js';

/**
 * Main entry point
 * Arguments are not read: every invocation produces the same output
 */
function main(): void {
  try {
    resetTerminal(process.stdout);
  } catch (error) {
    process.stderr.write(`Error: ${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  }
}

// Self-executing entry point
main();
