/**
 * Go identifier rules: keywords, the blank identifier and export status.
 */

/** The blank (discard) identifier */
export const BLANK_IDENTIFIER = '_';

/** Go reserved words */
export const GO_KEYWORDS: ReadonlySet<string> = new Set([
  'break', 'case', 'chan', 'const', 'continue', 'default', 'defer', 'else',
  'fallthrough', 'for', 'func', 'go', 'goto', 'if', 'import', 'interface',
  'map', 'package', 'range', 'return', 'select', 'struct', 'switch', 'type',
  'var',
]);

const IDENTIFIER_PATTERN = /^[\p{L}_][\p{L}\p{Nd}_]*$/u;

/**
 * Whether a name is exported, i.e. starts with an upper-case letter.
 */
export function isExported(name: string): boolean {
  return /^\p{Lu}/u.test(name);
}

/**
 * Whether a string is a valid Go identifier (and not a keyword).
 */
export function isGoIdentifier(name: string): boolean {
  return IDENTIFIER_PATTERN.test(name) && !GO_KEYWORDS.has(name);
}

/**
 * Whether a character starts an identifier
 */
export function isIdentifierStart(char: string): boolean {
  return /^[\p{L}_]$/u.test(char);
}

/**
 * Whether a character may continue an identifier
 */
export function isIdentifierPart(char: string): boolean {
  return /^[\p{L}\p{Nd}_]$/u.test(char);
}
