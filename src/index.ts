#!/usr/bin/env node
/**
 * Application Entry Point
 *
 * Generates the printable checklist PDF from the configured XML source.
 *
 * Usage:
 *   Production: node dist/index.js [input.xml] [output.pdf]
 *   Development: npx tsx src/index.ts [input.xml] [output.pdf]
 *
 * Both arguments are optional and override CHECKLIST_INPUT / CHECKLIST_OUTPUT.
 * Exit status is 0 on success and 1 on any failure; no PDF is written on failure.
 */

import { run } from './cli.js';

run(process.argv.slice(2))
  .then((status) => {
    process.exit(status);
  })
  .catch((err: unknown) => {
    console.error('[checklist] Fatal error:', err);
    process.exit(1);
  });
