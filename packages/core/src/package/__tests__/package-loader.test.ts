/**
 * Package Loader Tests
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { InputNotFoundError, ParseError } from '../../errors.js';
import { HybridGoParser } from '../../parsers/hybrid-go-parser.js';
import { PackageLoader } from '../package-loader.js';

describe('PackageLoader', () => {
  const parser = new HybridGoParser({ enableTreeSitter: false });
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docstringer-packages-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function write(name: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(path.join(dir, name)), { recursive: true });
    await fs.writeFile(path.join(dir, name), content);
  }

  it('should group sorted Go files by package in order of first appearance', async () => {
    await write('c.go', 'package beta\n');
    await write('b.go', 'package beta\n\nconst B = 1\n');
    await write('a.go', 'package alpha\n');
    await write('a_test.go', 'package alpha_test\n');
    await write('notes.txt', 'not go');
    await write('sub/d.go', 'package sub\n');

    const loader = new PackageLoader({ parser, exclude: ['*_test.go'] });
    const { packages, parseMethods } = await loader.load(dir);

    expect(packages.map((pkg) => [pkg.name, pkg.files.map((file) => path.basename(file.path))])).toEqual([
      ['alpha', ['a.go']],
      ['beta', ['b.go', 'c.go']],
    ]);
    expect(packages.every((pkg) => pkg.dir === dir)).toBe(true);
    expect([...parseMethods.values()]).toEqual(['fallback', 'fallback', 'fallback']);
  });

  it('should return no packages for a directory without Go files', async () => {
    await write('README.md', '# nothing here');

    const { packages } = await new PackageLoader({ parser }).load(dir);

    expect(packages).toEqual([]);
  });

  it('should abort on the first file that does not parse', async () => {
    await write('a.go', 'package p\n');
    await write('b.go', 'package p\n\nconst (\n');

    await expect(new PackageLoader({ parser }).load(dir)).rejects.toBeInstanceOf(ParseError);
  });

  it('should report a missing directory', async () => {
    await expect(new PackageLoader({ parser }).load(path.join(dir, 'missing'))).rejects.toBeInstanceOf(
      InputNotFoundError
    );
  });
});
