/**
 * Label Deriver Tests
 */

import { describe, it, expect } from 'vitest';

import { deriveEntries, deriveLabel, flattenLines } from '../label-deriver.js';

describe('deriveLabel', () => {
  it('should strip the constant name from its doc', () => {
    expect(deriveLabel('StatusBadRequest', 'StatusBadRequest Bad Request\n')).toBe('Bad Request');
  });

  it('should return an empty label without a doc', () => {
    expect(deriveLabel('StatusOK', null)).toBe('');
  });

  it('should return an empty label when the doc does not start with the name', () => {
    expect(deriveLabel('StatusOK', 'Returned on success\n')).toBe('');
    expect(deriveLabel('Foo', 'foo bar\n')).toBe('');
  });

  it('should require the name as a whole token', () => {
    expect(deriveLabel('Status', 'StatusCode of the reply\n')).toBe('');
  });

  it('should return an empty label when the doc is only the name', () => {
    expect(deriveLabel('StatusOK', 'StatusOK\n')).toBe('');
  });

  it('should flatten every kind of line break to a space', () => {
    expect(deriveLabel('A', 'A one\r\ntwo\rthree\nfour\n')).toBe('one two three four');
  });

  it('should keep inner whitespace and strip the name only once', () => {
    expect(deriveLabel('Friday', 'Friday Friday\n\tthe last workday\n')).toBe('Friday \tthe last workday');
  });

  it('should pass quotes and Unicode through unchanged', () => {
    expect(deriveLabel('Größe', 'Größe in "Metern" ✓\n')).toBe('in "Metern" ✓');
  });

  it('should trim the white space Go trims', () => {
    expect(deriveLabel('A', 'A\u00A0one\u0085\n')).toBe('one');
    expect(deriveLabel('A', 'A one\uFEFF\n')).toBe('one\uFEFF');
    expect(deriveLabel('A', 'A\uFEFFone\n')).toBe('');
  });

  it('should be idempotent', () => {
    const cases: [string, string][] = [
      ['StatusNotFound', 'StatusNotFound Not Found\n'],
      ['A', 'A one\r\ntwo\n'],
      ['StatusOK', 'StatusOK\n'],
      ['Other', 'Unrelated text\n'],
    ];

    for (const [name, source] of cases) {
      const label = deriveLabel(name, source);
      expect(deriveLabel(name, flattenLines(source))).toBe(label);
      if (label !== '') {
        expect(deriveLabel(name, `${name} ${label}`)).toBe(label);
      }
    }
  });
});

describe('deriveEntries', () => {
  it('should pair every candidate with its label, keeping order', () => {
    const entries = deriveEntries([
      { name: 'StatusNotFound', type: 'StatusCode', doc: 'StatusNotFound Not Found\n', file: 'a.go', line: 3 },
      { name: 'StatusTeapot', type: 'StatusCode', doc: null, file: 'a.go', line: 4 },
    ]);

    expect(entries).toEqual([
      { name: 'StatusNotFound', message: 'Not Found' },
      { name: 'StatusTeapot', message: '' },
    ]);
  });
});
