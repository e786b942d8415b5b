#!/usr/bin/env node
/**
 * @fileoverview taskpilot CLI
 *
 * Usage:
 *   taskpilot run "<objective>" [options]
 *   taskpilot tools
 *   taskpilot tool-help <name>
 *   taskpilot config
 *   taskpilot --help
 */

import { consoleIO, main } from './commands.js';

const controller = new AbortController();

// First Ctrl+C asks the loop to stop after the current step; a second one
// falls through to the default handler.
process.once('SIGINT', () => {
  console.error('\nInterrupt requested, finishing the current step...');
  controller.abort();
});

main(process.argv.slice(2), consoleIO, { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
