/**
 * Generator Tests
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import {
  ConfigurationError,
  InputNotFoundError,
  ParseError,
  SemanticValidationError,
  WriteError,
} from '../../errors.js';
import { generateStringMethods, type GenerateOptions } from '../generator.js';

const FIXTURES = fileURLToPath(new URL('../../../../../test-fixtures/go/', import.meta.url));

const STATUS_CODE_OUTPUT = [
  '// Code generated by docstringer. DO NOT EDIT.',
  '',
  'package http',
  '',
  '// String returns comment of const type StatusCode',
  'func (s StatusCode) String() string {',
  '\tswitch s {',
  '\tcase StatusBadRequest:',
  '\t\treturn "Bad Request"',
  '\tcase StatusNotFound:',
  '\t\treturn "Not Found"',
  '\tdefault:',
  '\t\treturn "Unknown"',
  '\t}',
  '}',
  '',
].join('\n');

describe('generateStringMethods', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'docstringer-generate-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function run(options: Partial<GenerateOptions> & { typeName: string }) {
    return generateStringMethods({
      dir,
      env: {},
      overrides: { parser: { enableTreeSitter: false } },
      ...options,
    });
  }

  async function copyFixture(name: string): Promise<void> {
    await fs.copyFile(path.join(FIXTURES, name), path.join(dir, path.basename(name)));
  }

  async function listDir(): Promise<string[]> {
    return (await fs.readdir(dir)).sort();
  }

  it('should generate the StatusCode String method', async () => {
    await copyFixture('http/statuscode.go');

    const report = await run({ typeName: 'StatusCode' });

    const outputPath = path.join(dir, 'statuscode_string_gen.go');
    await expect(fs.readFile(outputPath, 'utf-8')).resolves.toBe(STATUS_CODE_OUTPUT);
    expect(report.generated).toEqual([
      {
        packageName: 'http',
        outputPath,
        entries: [
          { name: 'StatusBadRequest', message: 'Bad Request' },
          { name: 'StatusNotFound', message: 'Not Found' },
        ],
      },
    ]);
    expect(report.skipped).toEqual([]);
    expect(report.files).toEqual([{ path: path.join(dir, 'statuscode.go'), parser: 'fallback' }]);
  });

  it('should write nothing when no constant has the type', async () => {
    await copyFixture('http/statuscode.go');

    const report = await run({ typeName: 'Method' });

    expect(report.generated).toEqual([]);
    expect(report.skipped).toEqual([{ packageName: 'http', reason: 'no-matching-constants' }]);
    await expect(listDir()).resolves.toEqual(['statuscode.go']);
  });

  it('should emit an empty message for constants without a matching doc', async () => {
    await copyFixture('weekday/weekday.go');

    const report = await run({ typeName: 'Weekday' });

    expect(report.generated[0]?.entries).toEqual([
      { name: 'Sunday', message: 'Sunday, first day' },
      { name: 'Monday', message: 'Monday' },
      { name: 'Tuesday', message: 'is the day after Monday' },
      { name: 'Wednesday', message: 'Wednesday' },
      { name: 'Thursday', message: '' },
      { name: 'Friday', message: 'Friday \tthe last workday' },
      { name: 'Saturday', message: '' },
    ]);
    const generated = await fs.readFile(path.join(dir, 'weekday_string_gen.go'), 'utf-8');
    expect(generated).toContain('\tcase Thursday:\n\t\treturn ""\n');
    expect(generated).toContain('\tcase Friday:\n\t\treturn "Friday \\tthe last workday"\n');
  });

  it('should prefix output names when the directory holds several packages', async () => {
    await fs.writeFile(path.join(dir, 'a.go'), 'package alpha\n\ntype T int\n\nconst (\n\t// A first\n\tA T = 1\n)\n');
    await fs.writeFile(path.join(dir, 'b.go'), 'package beta\n\ntype T int\n\nconst (\n\t// B second\n\tB T = 2\n)\n');

    const report = await run({ typeName: 'T' });

    expect(report.generated.map((pkg) => path.basename(pkg.outputPath))).toEqual([
      'alpha_t_string_gen.go',
      'beta_t_string_gen.go',
    ]);
    const beta = await fs.readFile(path.join(dir, 'beta_t_string_gen.go'), 'utf-8');
    expect(beta).toContain('package beta\n');
    expect(beta).toContain('func (t T) String() string {\n\tswitch t {\n\tcase B:\n\t\treturn "second"\n');
  });

  it('should not take a label from the doc of an ungrouped declaration', async () => {
    await fs.writeFile(path.join(dir, 'b.go'), 'package p\n\ntype T int\n\n// B second\nconst B T = 2\n');

    const report = await run({ typeName: 'T' });

    expect(report.generated[0]?.entries).toEqual([{ name: 'B', message: '' }]);
  });

  it('should write to an explicit output file', async () => {
    await copyFixture('http/statuscode.go');
    const output = path.join(dir, 'codes.go');

    const report = await run({ typeName: 'StatusCode', output });

    expect(report.generated[0]?.outputPath).toBe(output);
    await expect(fs.readFile(output, 'utf-8')).resolves.toBe(STATUS_CODE_OUTPUT);
  });

  it('should require a type name', async () => {
    await expect(run({ typeName: '' })).rejects.toBeInstanceOf(ConfigurationError);
    await expect(run({ typeName: 'not-a-type' })).rejects.toThrow('"not-a-type" is not a valid Go type name');
  });

  it('should require an existing directory', async () => {
    await expect(run({ typeName: 'T', dir: path.join(dir, 'missing') })).rejects.toBeInstanceOf(
      InputNotFoundError
    );

    const file = path.join(dir, 'plain.go');
    await fs.writeFile(file, 'package p\n');
    await expect(run({ typeName: 'T', dir: file })).rejects.toThrow(`${file}: not a directory`);
  });

  it('should abort when the package fails the declaration check', async () => {
    await fs.writeFile(path.join(dir, 'a.go'), 'package p\n\ntype T int\n\nconst A T = 1\n');
    await fs.writeFile(path.join(dir, 'b.go'), 'package p\n\nconst A T = 2\n');

    const error: unknown = await run({ typeName: 'T' }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(SemanticValidationError);
    if (error instanceof SemanticValidationError) {
      expect(error.diagnostics.map((d) => d.message)).toEqual([
        `A redeclared in this block (previous declaration at ${path.join(dir, 'a.go')}:5)`,
      ]);
    }
    await expect(listDir()).resolves.toEqual(['a.go', 'b.go']);
  });

  it('should abort on a file that does not parse', async () => {
    await copyFixture('http/statuscode.go');
    await fs.writeFile(path.join(dir, 'zz.go'), 'package http\n\nconst (\n');

    await expect(run({ typeName: 'StatusCode' })).rejects.toBeInstanceOf(ParseError);
    await expect(listDir()).resolves.toEqual(['statuscode.go', 'zz.go']);
  });

  it('should report an output file that cannot be written', async () => {
    await copyFixture('http/statuscode.go');
    const output = path.join(dir, 'missing', 'codes.go');

    await expect(run({ typeName: 'StatusCode', output })).rejects.toBeInstanceOf(WriteError);
  });

  it('should honour exclude patterns from the configuration file', async () => {
    await copyFixture('http/statuscode.go');
    await fs.mkdir(path.join(dir, '.docstringer'));
    await fs.writeFile(path.join(dir, '.docstringer', 'config.json'), JSON.stringify({ exclude: ['status*.go'] }));

    const report = await run({ typeName: 'StatusCode' });

    expect(report.files).toEqual([]);
    expect(report.generated).toEqual([]);
  });
});
