/**
 * Generator - Orchestrates one generation run
 *
 * Loads configuration, parses the directory, and for each package in turn
 * checks it, extracts the constants of the target type, derives their labels,
 * renders, formats and writes the String method. Packages without a matching
 * constant are skipped. The first error aborts the run.
 */

import * as fs from 'node:fs/promises';

import { createChecker, type PackageChecker } from '../checks/index.js';
import { ConfigLoader, mergeConfig } from '../config/config-loader.js';
import {
  ConfigurationError,
  InputNotFoundError,
  SemanticValidationError,
  WriteError,
  toError,
} from '../errors.js';
import { extractCandidates } from '../extraction/declaration-extractor.js';
import { deriveEntries } from '../extraction/label-deriver.js';
import { isGoIdentifier } from '../go/identifiers.js';
import { silentLogger, type Logger } from '../logger.js';
import { PackageLoader } from '../package/package-loader.js';
import { createGoFileParser, type GoFileParser } from '../parsers/hybrid-go-parser.js';
import { createFormatter, type GoFormatter } from '../render/formatter.js';
import { renderStringMethod } from '../render/renderer.js';
import { resolveOutputPath } from './output-path.js';

import type { Stats } from 'node:fs';
import type { DocstringerConfig, PartialDocstringerConfig } from '../config/types.js';
import type { CommandRunner } from '../exec/command-runner.js';
import type { DerivedEntry, GoPackage, ParseMethod } from '../types.js';

// ============================================================================
// Types
// ============================================================================

export interface GenerateOptions {
  /** Target constant type */
  typeName: string;
  /** Directory holding the Go package(s); defaults to the working directory */
  dir?: string | undefined;
  /** Explicit output file */
  output?: string | undefined;
  /** Overrides applied on top of file and environment configuration */
  overrides?: PartialDocstringerConfig | undefined;
  /** Environment for configuration overrides (defaults to process.env) */
  env?: NodeJS.ProcessEnv | undefined;
  logger?: Logger | undefined;
  /** Runner for gofmt and go vet */
  runner?: CommandRunner | undefined;
  parser?: GoFileParser | undefined;
  formatter?: GoFormatter | undefined;
  checker?: PackageChecker | undefined;
  /** Called when a package starts processing */
  onPackage?: ((pkg: GoPackage) => void) | undefined;
}

export interface GeneratedPackage {
  packageName: string;
  outputPath: string;
  entries: DerivedEntry[];
}

export type SkipReason = 'no-matching-constants';

export interface SkippedPackage {
  packageName: string;
  reason: SkipReason;
}

export interface GenerationReport {
  typeName: string;
  dir: string;
  config: DocstringerConfig;
  files: { path: string; parser: ParseMethod }[];
  generated: GeneratedPackage[];
  skipped: SkippedPackage[];
  warnings: string[];
}

// ============================================================================
// Helpers
// ============================================================================

async function assertDirectory(dir: string): Promise<void> {
  let stats: Stats;
  try {
    stats = await fs.stat(dir);
  } catch (error) {
    throw new InputNotFoundError(`${dir}: no such directory`, dir, toError(error));
  }
  if (!stats.isDirectory()) {
    throw new InputNotFoundError(`${dir}: not a directory`, dir);
  }
}

async function writeOutput(outputPath: string, content: string): Promise<void> {
  try {
    await fs.writeFile(outputPath, content, { encoding: 'utf-8', mode: 0o664 });
  } catch (error) {
    const cause = toError(error);
    throw new WriteError(`failed to write ${outputPath}: ${cause.message}`, outputPath, cause);
  }
}

// ============================================================================
// Generation
// ============================================================================

/**
 * Generate String methods for every package of a directory.
 *
 * @throws ConfigurationError when the type name is missing or invalid
 * @throws InputNotFoundError when `dir` is not a directory
 */
export async function generateStringMethods(options: GenerateOptions): Promise<GenerationReport> {
  const logger = options.logger ?? silentLogger;
  const { typeName } = options;
  const dir = options.dir ?? '.';

  if (!typeName) {
    throw new ConfigurationError('type name must be set');
  }
  if (!isGoIdentifier(typeName)) {
    throw new ConfigurationError(`"${typeName}" is not a valid Go type name`);
  }

  await assertDirectory(dir);

  const loaded = await new ConfigLoader({ rootDir: dir, env: options.env }).load();
  const config = options.overrides ? mergeConfig(loaded.config, options.overrides) : loaded.config;
  if (loaded.configPath) {
    logger.debug(`using configuration ${loaded.configPath}`);
  }

  const parser = options.parser ?? createGoFileParser(config.parser, logger);
  const checker = options.checker ?? createChecker(config.checker, options.runner);
  const formatter = options.formatter ?? createFormatter(config.formatter, {
    useTreeSitter: config.parser.enableTreeSitter,
    runner: options.runner,
  });

  const { packages, parseMethods, warnings } = await new PackageLoader({
    parser,
    exclude: config.exclude,
    logger,
  }).load(dir);

  const report: GenerationReport = {
    typeName,
    dir,
    config,
    files: [...parseMethods].map(([filePath, method]) => ({ path: filePath, parser: method })),
    generated: [],
    skipped: [],
    warnings,
  };

  const multiplePackages = packages.length > 1;

  for (const pkg of packages) {
    options.onPackage?.(pkg);

    const result = await checker.check(pkg);
    if (!result.ok) {
      throw new SemanticValidationError(pkg.name, result.diagnostics);
    }

    const entries = deriveEntries(extractCandidates(pkg, typeName));
    if (entries.length === 0) {
      logger.debug(`package ${pkg.name}: no constants of type ${typeName}, skipped`);
      report.skipped.push({ packageName: pkg.name, reason: 'no-matching-constants' });
      continue;
    }

    const outputPath = resolveOutputPath({
      dir,
      typeName,
      packageName: pkg.name,
      output: options.output,
      multiplePackages,
    });

    const rendered = renderStringMethod({ packageName: pkg.name, typeName, entries });
    const formatted = await formatter.format(rendered, outputPath);
    await writeOutput(outputPath, formatted);

    logger.info(`wrote ${outputPath} (${entries.length} constant${entries.length === 1 ? '' : 's'})`);
    report.generated.push({ packageName: pkg.name, outputPath, entries });
  }

  return report;
}
