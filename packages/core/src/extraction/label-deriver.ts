/**
 * Label Deriver
 *
 * Turns a candidate's doc text into the message its String method returns.
 * Doc text is expected to follow the "Name description" convention.
 */

import type { CandidateConstant, DerivedEntry } from '../types.js';

const LINE_BREAKS = /\r\n|\r|\n/g;

/** Unicode White_Space, the set Go's `unicode.IsSpace` accepts */
const WHITE_SPACE = '\\t\\n\\v\\f\\r \\u0085\\u00A0\\u1680\\u2000-\\u200A\\u2028\\u2029\\u202F\\u205F\\u3000';
const SPACE_CHAR = new RegExp(`^[${WHITE_SPACE}]$`, 'u');
const SURROUNDING_SPACE = new RegExp(`^[${WHITE_SPACE}]+|[${WHITE_SPACE}]+$`, 'gu');

/**
 * Replace every line break with a single space
 */
export function flattenLines(text: string): string {
  return text.replace(LINE_BREAKS, ' ');
}

/**
 * Strip leading and trailing white space; unlike `String.prototype.trim` this
 * keeps U+FEFF and strips U+0085.
 */
export function trimSpace(text: string): string {
  return text.replace(SURROUNDING_SPACE, '');
}

/**
 * Whether `text` starts with `name` as a whole token
 */
function startsWithToken(text: string, name: string): boolean {
  if (name.length === 0 || !text.startsWith(name)) {return false;}
  const next = text.charAt(name.length);
  return next === '' || SPACE_CHAR.test(next);
}

/**
 * Derive the label for a constant from its doc text.
 *
 * Returns `""` when there is no doc, or when the doc does not start with the
 * constant's name.
 */
export function deriveLabel(name: string, source: string | null): string {
  if (source === null) {return '';}
  const flat = flattenLines(source);
  if (!startsWithToken(flat, name)) {return '';}
  return trimSpace(flat.slice(name.length));
}

export function deriveEntries(candidates: readonly CandidateConstant[]): DerivedEntry[] {
  return candidates.map((candidate) => ({
    name: candidate.name,
    message: deriveLabel(candidate.name, candidate.doc),
  }));
}
