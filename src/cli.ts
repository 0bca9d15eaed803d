#!/usr/bin/env node
/**
 * modelgate CLI
 *
 * Usage:
 *   modelgate [start|init|models|usage|status] [options]
 *
 * See `modelgate --help`.
 *
 * @packageDocumentation
 */

import { run } from './commands.js';

run(process.argv.slice(2), {
  env: process.env,
  out: (line) => console.log(line),
  err: (line) => console.error(line),
}).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('Fatal:', err instanceof Error ? err.message : err);
    process.exitCode = 1;
  },
);
