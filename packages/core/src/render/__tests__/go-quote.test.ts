/**
 * Go String Quoting Tests
 */

import { describe, it, expect } from 'vitest';

import { quoteGoString } from '../go-quote.js';

describe('quoteGoString', () => {
  it('should wrap plain text in double quotes', () => {
    expect(quoteGoString('Bad Request')).toBe('"Bad Request"');
    expect(quoteGoString('')).toBe('""');
  });

  it('should escape quotes and backslashes', () => {
    expect(quoteGoString('say "hi" \\ now')).toBe('"say \\"hi\\" \\\\ now"');
  });

  it('should use short escapes for common control characters', () => {
    expect(quoteGoString('\x07\b\f\n\r\t\v')).toBe('"\\a\\b\\f\\n\\r\\t\\v"');
  });

  it('should use hex escapes for other ASCII control characters', () => {
    expect(quoteGoString('\x00\x1b\x7f')).toBe('"\\x00\\x1b\\x7f"');
  });

  it('should use unicode escapes for non-printable runes', () => {
    expect(quoteGoString('\u0085\u00a0\u200b')).toBe('"\\u0085\\u00a0\\u200b"');
    expect(quoteGoString('\u{E0001}')).toBe('"\\U000e0001"');
  });

  it('should keep printable Unicode verbatim', () => {
    expect(quoteGoString('Größe ✓ 日本 😀 é')).toBe('"Größe ✓ 日本 😀 é"');
  });

  it('should replace unpaired surrogates', () => {
    expect(quoteGoString('a\uD800b')).toBe('"a\uFFFDb"');
  });
});
