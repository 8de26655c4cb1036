/**
 * Package Loader
 *
 * Reads the Go files of one directory (not its subdirectories) and groups
 * them into packages by their package clause.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

import { minimatch } from 'minimatch';

import { InputNotFoundError, ParseError, toError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';

import type { Dirent } from 'node:fs';
import type { GoFileParser } from '../parsers/hybrid-go-parser.js';
import type { GoPackage, GoSourceFile, ParseMethod } from '../types.js';

export interface PackageLoaderOptions {
  parser: GoFileParser;
  /** Glob patterns matched against file names relative to the directory */
  exclude?: readonly string[] | undefined;
  logger?: Logger | undefined;
}

export interface LoadedPackages {
  packages: GoPackage[];
  /** Parser used for each file, keyed by path */
  parseMethods: Map<string, ParseMethod>;
  warnings: string[];
}

export class PackageLoader {
  private readonly parser: GoFileParser;
  private readonly exclude: readonly string[];
  private readonly logger: Logger;

  constructor(options: PackageLoaderOptions) {
    this.parser = options.parser;
    this.exclude = options.exclude ?? [];
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Go files of a directory, sorted by name, minus excluded ones
   *
   * @throws InputNotFoundError when the directory cannot be listed
   */
  async listGoFiles(dir: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      throw new InputNotFoundError(`cannot read directory ${dir}`, dir, toError(error));
    }

    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith('.go'))
      .map((entry) => entry.name)
      .filter((name) => {
        const excluded = this.exclude.some((pattern) => minimatch(name, pattern));
        if (excluded) {
          this.logger.debug(`${name}: excluded`);
        }
        return !excluded;
      })
      .sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
      .map((name) => path.join(dir, name));
  }

  /**
   * Parse every Go file of `dir` and group by package name, in order of
   * first appearance.
   *
   * @throws ParseError on the first file that does not parse
   */
  async load(dir: string): Promise<LoadedPackages> {
    const files = await this.listGoFiles(dir);
    const byName = new Map<string, GoSourceFile[]>();
    const parseMethods = new Map<string, ParseMethod>();
    const warnings: string[] = [];

    for (const filePath of files) {
      let source: string;
      try {
        source = await fs.readFile(filePath, 'utf-8');
      } catch (error) {
        throw new ParseError('cannot read file', filePath, 1, 1, toError(error));
      }

      const parsed = this.parser.parseFile(source, filePath);
      parseMethods.set(filePath, parsed.method);
      for (const warning of parsed.warnings) {
        warnings.push(`${filePath}: ${warning}`);
        this.logger.debug(`${filePath}: ${warning}`);
      }

      const group = byName.get(parsed.file.packageName);
      if (group) {
        group.push(parsed.file);
      } else {
        byName.set(parsed.file.packageName, [parsed.file]);
      }
    }

    const packages = [...byName].map(([name, pkgFiles]) => ({ name, dir, files: pkgFiles }));
    return { packages, parseMethods, warnings };
  }
}
