#!/usr/bin/env tsx
/**
 * docstringer CLI entry point
 */

import { runCli } from '../program.js';

process.exitCode = await runCli(process.argv.slice(2), {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
  interactive: Boolean(process.stderr.isTTY),
});
