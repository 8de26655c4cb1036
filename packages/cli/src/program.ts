/**
 * Program - wires the generate command to process I/O and exit codes
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { CommanderError } from 'commander';

import { createGenerateCommand, EXIT_OK, EXIT_USAGE, type CliIO } from './commands/generate.js';

/**
 * Version from the package manifest
 */
export function readVersion(): string {
  const dir = dirname(fileURLToPath(import.meta.url));
  const manifest: unknown = JSON.parse(readFileSync(join(dir, '..', 'package.json'), 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  return '0.0.0';
}

/**
 * Parse `argv` (without the node and script entries) and run.
 * Resolves with the exit code; never calls process.exit.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  let exitCode = EXIT_OK;
  const program = createGenerateCommand(io, (code) => {
    exitCode = code;
  });

  program
    .version(readVersion())
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text.replace(/\n$/, '')),
      writeErr: (text) => io.stderr(text.replace(/\n$/, '')),
    });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version exit with 0
      return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    throw error;
  }

  return exitCode;
}
