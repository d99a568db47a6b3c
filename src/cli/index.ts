#!/usr/bin/env node

/**
 * qcalc CLI -- evaluate rational expressions from stdin
 *
 * Usage:
 *   qcalc [--verbose] [--no-color] < input.txt
 */

import { run } from "./run.js";

run(process.argv.slice(2), {
  input: process.stdin,
  output: process.stdout,
  stderr: process.stderr,
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error(`[qcalc] Fatal: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  },
);
