/**
 * Go Declaration Parser Tests
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { describe, it, expect } from 'vitest';

import { parseGoDeclarations } from '../fallback/go-declaration-parser.js';

import type { ConstDeclaration, GoSourceFile } from '../../types.js';

const WEEKDAY_FIXTURE = fileURLToPath(
  new URL('../../../../../test-fixtures/go/weekday/weekday.go', import.meta.url)
);

function constDecls(file: GoSourceFile): ConstDeclaration[] {
  return file.decls.filter((decl): decl is ConstDeclaration => decl.kind === 'const');
}

describe('parseGoDeclarations', () => {
  describe('weekday fixture', () => {
    const file = parseGoDeclarations(readFileSync(WEEKDAY_FIXTURE, 'utf-8'), 'weekday.go');

    it('should read the package clause and every top-level declaration', () => {
      expect(file.packageName).toBe('weekday');
      expect(file.decls.map((decl) => (decl.kind === 'const' ? 'const' : decl.keyword))).toEqual([
        'import', 'type', 'type', 'const', 'const', 'const', 'func',
      ]);
      expect(file.decls.map((decl) => decl.line)).toEqual([5, 8, 10, 12, 28, 40, 42]);
    });

    it('should keep the names of non-constant declarations', () => {
      const names = file.decls.flatMap((decl) => (decl.kind === 'other' ? decl.names : []));
      expect(names).toEqual(['Weekday', 'Level', 'describe']);
    });

    it('should parse grouped constant specs with their docs', () => {
      const [first] = constDecls(file);

      expect(first?.grouped).toBe(true);
      expect(first?.doc).toBeNull();
      expect(first?.specs.map((spec) => [spec.names, spec.type?.text ?? null, spec.values, spec.doc])).toEqual([
        [['Sunday'], 'Weekday', ['iota'], 'Sunday Sunday, first day\n'],
        [['Monday'], null, [], 'Monday Monday\n'],
        [['Tuesday'], null, [], 'Tuesday is the day after Monday\n'],
        [['_'], null, [], null],
        [['hidden'], null, [], 'hidden Hidden day\n'],
        [['MaxDays'], null, ['7'], 'MaxDays Upper bound\n'],
        [['Later'], null, [], 'Later Later\n'],
      ]);
    });

    it('should ignore trailing comments and read block comment docs', () => {
      const second = constDecls(file)[1];

      expect(second?.specs.map((spec) => [spec.names[0], spec.values, spec.doc])).toEqual([
        ['Low', ['iota'], 'Low Low level\n'],
        ['Wednesday', ['iota + 3'], 'Wednesday Wednesday\n'],
        ['Thursday', [], null],
        ['Friday', [], 'Friday Friday\n\tthe last workday\n'],
      ]);
      expect(second?.specs.map((spec) => spec.line)).toEqual([30, 32, 33, 36]);
    });

    it('should keep the doc of an ungrouped constant on the declaration', () => {
      const third = constDecls(file)[2];

      expect(third?.grouped).toBe(false);
      expect(third?.doc).toBe('Saturday Saturday\n');
      expect(third?.specs).toEqual([
        {
          names: ['Saturday'],
          type: { kind: 'identifier', text: 'Weekday' },
          values: ['10'],
          doc: null,
          line: 40,
        },
      ]);
    });
  });

  it('should classify spec types', () => {
    const source = [
      'package p',
      '',
      'const (',
      '\tA time.Duration = 1',
      '\tB *T = nil',
      '\tC, D = 1, f(2, 3)',
      '\tE T',
      ')',
      '',
    ].join('\n');

    const [decl] = constDecls(parseGoDeclarations(source, 'test.go'));

    expect(decl?.specs.map((spec) => [spec.names, spec.type, spec.values])).toEqual([
      [['A'], { kind: 'qualified', text: 'time.Duration' }, ['1']],
      [['B'], { kind: 'other', text: '*T' }, ['nil']],
      [['C', 'D'], null, ['1', 'f(2, 3)']],
      [['E'], { kind: 'identifier', text: 'T' }, []],
    ]);
  });

  it('should reduce methods to an unnamed declaration', () => {
    const file = parseGoDeclarations('package p\n\nfunc (t T) String() string { return "" }\n', 'test.go');

    expect(file.decls).toEqual([{ kind: 'other', keyword: 'method', names: [], line: 3 }]);
  });

  it('should collect every name of a var group', () => {
    const file = parseGoDeclarations('package p\n\nvar (\n\ta, b = 1, 2\n\tc int\n)\n', 'test.go');

    expect(file.decls).toEqual([{ kind: 'other', keyword: 'var', names: ['a', 'b', 'c'], line: 3 }]);
  });

  it('should fail without a package clause', () => {
    expect(() => parseGoDeclarations('const A = 1\n', 'test.go')).toThrow(
      "test.go:1:1: expected 'package', found 'const'"
    );
  });

  it('should fail on a missing initializer expression', () => {
    expect(() => parseGoDeclarations('package p\nconst A =\n', 'test.go')).toThrow(
      'test.go:2:9: expected expression'
    );
  });

  it('should fail on an unclosed constant group', () => {
    expect(() => parseGoDeclarations('package p\nconst (\nA = 1\n', 'test.go')).toThrow(
      'test.go:4:1: unexpected EOF'
    );
  });
});
