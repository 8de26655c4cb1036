/**
 * Go interpreted string literals, escaped the way `strconv.Quote` does.
 */

const SIMPLE_ESCAPES: ReadonlyMap<number, string> = new Map([
  [0x07, '\\a'],
  [0x08, '\\b'],
  [0x0c, '\\f'],
  [0x0a, '\\n'],
  [0x0d, '\\r'],
  [0x09, '\\t'],
  [0x0b, '\\v'],
]);

const REPLACEMENT_CHARACTER = '\uFFFD';

const PRINTABLE = /^[\p{L}\p{M}\p{N}\p{P}\p{S} ]$/u;

function hex(codePoint: number, width: number): string {
  return codePoint.toString(16).padStart(width, '0');
}

function isSurrogate(codePoint: number): boolean {
  return codePoint >= 0xd800 && codePoint <= 0xdfff;
}

function escapeRune(char: string, codePoint: number): string {
  if (char === '"' || char === '\\') {return `\\${char}`;}
  if (PRINTABLE.test(char)) {return char;}

  const simple = SIMPLE_ESCAPES.get(codePoint);
  if (simple !== undefined) {return simple;}

  if (codePoint < 0x20 || codePoint === 0x7f) {return `\\x${hex(codePoint, 2)}`;}
  if (codePoint < 0x10000) {return `\\u${hex(codePoint, 4)}`;}
  return `\\U${hex(codePoint, 8)}`;
}

/**
 * Quote a string as a double-quoted Go literal.
 *
 * Unpaired surrogates are written as U+FFFD.
 */
export function quoteGoString(value: string): string {
  let out = '"';
  for (const char of value) {
    const codePoint = char.codePointAt(0) ?? 0;
    out += isSurrogate(codePoint) ? REPLACEMENT_CHARACTER : escapeRune(char, codePoint);
  }
  return `${out}"`;
}
