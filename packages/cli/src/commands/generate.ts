/**
 * Generate Command - docstringer -t <Type> [directory]
 *
 * Writes a String() method for the target constant type into each package
 * of the directory that declares constants of that type.
 */

import { Command, Option } from 'commander';
import {
  ConfigurationError,
  InputNotFoundError,
  VALID_CHECKERS,
  VALID_FORMATTERS,
  generateStringMethods,
  toError,
  type CommandRunner,
  type PartialDocstringerConfig,
} from 'docstringer-core';

import { createCliLogger, formatFatal } from '../output/logger.js';
import { formatJsonReport, formatTextReport, REPORT_FORMATS } from '../output/reporter.js';
import { createSpinner } from '../ui/spinner.js';

/** Exit codes */
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface GenerateCommandOptions {
  type?: string;
  output?: string;
  formatter?: string;
  checker?: string;
  /** false when --no-tree-sitter is given */
  treeSitter: boolean;
  exclude?: string[];
  format: string;
  verbose?: boolean;
}

/** Where the command writes and what it runs with */
export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  env?: NodeJS.ProcessEnv | undefined;
  /** Show a spinner in text mode */
  interactive?: boolean | undefined;
  /** Runner for gofmt and go vet */
  runner?: CommandRunner | undefined;
}

/**
 * Translate command-line flags into configuration overrides
 */
export function toOverrides(options: GenerateCommandOptions): PartialDocstringerConfig {
  const overrides: PartialDocstringerConfig = {};

  const formatter = VALID_FORMATTERS.find((kind) => kind === options.formatter);
  if (formatter) {overrides.formatter = formatter;}

  const checker = VALID_CHECKERS.find((kind) => kind === options.checker);
  if (checker) {overrides.checker = checker;}

  if (!options.treeSitter) {overrides.parser = { enableTreeSitter: false };}
  if (options.exclude && options.exclude.length > 0) {overrides.exclude = options.exclude;}

  return overrides;
}

/**
 * Run a generation and report it. Resolves with the process exit code.
 */
export async function generateAction(
  directory: string | undefined,
  options: GenerateCommandOptions,
  io: CliIO,
  usage: () => string
): Promise<number> {
  const format = options.format === 'json' ? 'json' : 'text';
  const logger = createCliLogger({ verbose: options.verbose ?? false, write: io.stderr });

  const spinner = format === 'text' && io.interactive ? createSpinner('Generating String methods...') : null;
  spinner?.start();

  try {
    const report = await generateStringMethods({
      typeName: options.type ?? '',
      dir: directory ?? '.',
      output: options.output,
      overrides: toOverrides(options),
      env: io.env,
      logger,
      runner: io.runner,
      onPackage: (pkg) => spinner?.text(`Generating String methods for package ${pkg.name}...`),
    });

    spinner?.stop();

    if (format === 'json') {
      io.stdout(formatJsonReport(report));
    } else {
      for (const line of formatTextReport(report)) {
        io.stdout(line);
      }
    }
    return EXIT_OK;
  } catch (error) {
    spinner?.stop();

    const err = toError(error);
    io.stderr(formatFatal(err.message));
    if (err instanceof ConfigurationError || err instanceof InputNotFoundError) {
      io.stderr(usage());
      return EXIT_USAGE;
    }
    return EXIT_FAILURE;
  }
}

/**
 * Create the command. The exit code of the last run is passed to `onExit`.
 */
export function createGenerateCommand(io: CliIO, onExit: (code: number) => void): Command {
  const command = new Command('docstringer');

  command
    .description('Generate a String() method for a Go constant type from its doc comments')
    .usage('[options] -t <TypeName> [directory]')
    .argument('[directory]', 'directory of the Go package', '.')
    .option('-t, --type <name>', 'type name of the constants; must be set')
    .option('-o, --output <file>', 'output file name; default <directory>/<type>_string_gen.go')
    .addOption(new Option('--formatter <kind>', 'formatter for generated source').choices([...VALID_FORMATTERS]))
    .addOption(new Option('--checker <kind>', 'package check run before extraction').choices([...VALID_CHECKERS]))
    .option('--no-tree-sitter', 'parse with the fallback parser only')
    .option('--exclude <glob...>', 'skip Go files matching these patterns')
    .addOption(new Option('-f, --format <format>', 'report format').choices([...REPORT_FORMATS]).default('text'))
    .option('-v, --verbose', 'enable verbose output')
    .action(async (directory: string | undefined, options: GenerateCommandOptions) => {
      onExit(await generateAction(directory, options, io, () => command.helpInformation()));
    });

  return command;
}
