#!/usr/bin/env node
/**
 * Main entry point for the logsift CLI.
 */

import { main } from './main.js';

main(process.argv)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
  });
