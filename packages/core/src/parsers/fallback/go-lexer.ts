/**
 * Go Lexer
 *
 * Tokenizer for Go source used when tree-sitter is unavailable. Produces
 * tokens with automatic semicolon insertion and collects comments separately
 * so doc comments can be attached by line.
 */

import { ParseError } from '../../errors.js';
import { GO_KEYWORDS, isIdentifierPart, isIdentifierStart } from '../../go/identifiers.js';

import type { GoComment } from '../comment-text.js';

// ============================================
// Types
// ============================================

export type GoTokenKind =
  | 'ident'
  | 'keyword'
  | 'int'
  | 'float'
  | 'imag'
  | 'char'
  | 'string'
  | 'op'
  | 'semicolon'
  | 'eof';

export interface GoToken {
  kind: GoTokenKind;
  /** Token text; `\n` for an automatically inserted semicolon */
  text: string;
  /** 1-based line */
  line: number;
  /** 1-based column */
  column: number;
  /** Offset into the source */
  offset: number;
}

/** A comment together with its source offset */
export interface LexedComment extends GoComment {
  offset: number;
}

export interface GoLexResult {
  tokens: GoToken[];
  comments: LexedComment[];
}

// ============================================
// Constants
// ============================================

/** Operators, longest first so the first match wins */
const OPERATORS = [
  '<<=', '>>=', '&^=', '...',
  '&&', '||', '<-', '++', '--', '==', '!=', '<=', '>=', ':=',
  '+=', '-=', '*=', '/=', '%=', '&=', '|=', '^=', '<<', '>>', '&^',
  '+', '-', '*', '/', '%', '&', '|', '^', '<', '>', '=', '!', '~',
  '(', ')', '[', ']', '{', '}', ',', ';', '.', ':',
];

/** Keywords after which a newline ends the statement */
const SEMICOLON_KEYWORDS = new Set(['break', 'continue', 'fallthrough', 'return']);

/** Operators after which a newline ends the statement */
const SEMICOLON_OPERATORS = new Set(['++', '--', ')', ']', '}']);

// ============================================
// Lexer
// ============================================

/**
 * Single-use Go tokenizer.
 */
export class GoLexer {
  private offset = 0;
  private line = 1;
  private lineStart = 0;
  private insertSemicolon = false;
  private readonly tokens: GoToken[] = [];
  private readonly comments: LexedComment[] = [];

  constructor(
    private readonly source: string,
    private readonly filePath: string
  ) {}

  /**
   * Tokenize the whole source.
   *
   * @throws ParseError on unterminated literals or comments and on invalid characters
   */
  tokenize(): GoLexResult {
    while (this.offset < this.source.length) {
      const char = this.peekChar();

      if (char === '\n') {
        this.newline();
        this.advance(1);
        this.line++;
        this.lineStart = this.offset;
        continue;
      }

      if (char === ' ' || char === '\t' || char === '\r' || char === '\uFEFF') {
        this.advance(char.length);
        continue;
      }

      if (this.source.startsWith('//', this.offset)) {
        this.lineComment();
        continue;
      }

      if (this.source.startsWith('/*', this.offset)) {
        this.blockComment();
        continue;
      }

      this.scanToken(char);
    }

    if (this.insertSemicolon) {
      this.push('semicolon', '\n', this.offset);
    }
    this.push('eof', '', this.offset);

    return { tokens: this.tokens, comments: this.comments };
  }

  // ==========================================================================
  // Scanning
  // ==========================================================================

  private scanToken(char: string): void {
    const start = this.offset;

    if (isIdentifierStart(char)) {
      while (this.offset < this.source.length && isIdentifierPart(this.peekChar())) {
        this.advance(this.peekChar().length);
      }
      const text = this.source.slice(start, this.offset);
      const keyword = GO_KEYWORDS.has(text);
      this.push(keyword ? 'keyword' : 'ident', text, start);
      this.insertSemicolon = !keyword || SEMICOLON_KEYWORDS.has(text);
      return;
    }

    if (/[0-9]/.test(char) || (char === '.' && /[0-9]/.test(this.source[this.offset + 1] ?? ''))) {
      this.number(start);
      this.insertSemicolon = true;
      return;
    }

    if (char === '"') {
      this.interpretedString(start);
      this.insertSemicolon = true;
      return;
    }

    if (char === '`') {
      this.rawString(start);
      this.insertSemicolon = true;
      return;
    }

    if (char === '\'') {
      this.rune(start);
      this.insertSemicolon = true;
      return;
    }

    const operator = OPERATORS.find((op) => this.source.startsWith(op, this.offset));
    if (!operator) {
      const codePoint = char.codePointAt(0) ?? 0;
      this.fail(`invalid character U+${codePoint.toString(16).toUpperCase().padStart(4, '0')}`, start);
    }

    this.advance(operator.length);
    this.push(operator === ';' ? 'semicolon' : 'op', operator, start);
    this.insertSemicolon = SEMICOLON_OPERATORS.has(operator);
  }

  private number(start: number): void {
    const hex = /^0[xX]/.test(this.source.slice(start, start + 2));
    const exponentMarkers = hex ? 'pP' : 'eE';
    let isFloat = false;

    while (this.offset < this.source.length) {
      const char = this.source.charAt(this.offset);
      if (/[0-9a-zA-Z_]/.test(char)) {
        if (exponentMarkers.includes(char)) {
          isFloat = true;
          const sign = this.source.charAt(this.offset + 1);
          if (sign === '+' || sign === '-') {
            this.advance(1);
          }
        }
        this.advance(1);
      } else if (char === '.') {
        isFloat = true;
        this.advance(1);
      } else {
        break;
      }
    }

    const text = this.source.slice(start, this.offset);
    const kind: GoTokenKind = text.endsWith('i') ? 'imag' : isFloat ? 'float' : 'int';
    this.push(kind, text, start);
  }

  private interpretedString(start: number): void {
    this.advance(1);
    for (;;) {
      const char = this.source.charAt(this.offset);
      if (char === '' || char === '\n') {
        this.fail('string literal not terminated', start);
      }
      if (char === '\\') {
        this.advance(2);
        continue;
      }
      this.advance(1);
      if (char === '"') {
        break;
      }
    }
    this.push('string', this.source.slice(start, this.offset), start);
  }

  private rawString(start: number): void {
    const startLine = this.line;
    const startColumn = start - this.lineStart + 1;
    const end = this.source.indexOf('`', start + 1);
    if (end < 0) {
      this.fail('raw string literal not terminated', start);
    }

    const text = this.source.slice(start, end + 1);
    this.tokens.push({ kind: 'string', text, line: startLine, column: startColumn, offset: start });
    this.skipLines(start, end + 1);
  }

  private rune(start: number): void {
    this.advance(1);
    for (;;) {
      const char = this.source.charAt(this.offset);
      if (char === '' || char === '\n') {
        this.fail('rune literal not terminated', start);
      }
      if (char === '\\') {
        this.advance(2);
        continue;
      }
      this.advance(1);
      if (char === '\'') {
        break;
      }
    }
    this.push('char', this.source.slice(start, this.offset), start);
  }

  // ==========================================================================
  // Comments
  // ==========================================================================

  private lineComment(): void {
    const start = this.offset;
    const newline = this.source.indexOf('\n', start);
    const end = newline < 0 ? this.source.length : newline;

    this.comments.push({ text: this.source.slice(start, end), line: this.line, endLine: this.line, offset: start });
    this.offset = end;
  }

  private blockComment(): void {
    const start = this.offset;
    const close = this.source.indexOf('*/', start + 2);
    if (close < 0) {
      this.fail('comment not terminated', start);
    }

    const end = close + 2;
    const text = this.source.slice(start, end);
    const startLine = this.line;
    const spansLines = text.includes('\n');

    // A multi-line comment acts like a newline
    if (spansLines) {
      this.newline();
    }
    this.skipLines(start, end);
    this.comments.push({ text, line: startLine, endLine: this.line, offset: start });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /** Emit the automatic semicolon owed at a line break, if any */
  private newline(): void {
    if (this.insertSemicolon) {
      this.push('semicolon', '\n', this.offset);
      this.insertSemicolon = false;
    }
  }

  /** Move past `[from, to)` counting the line breaks inside it */
  private skipLines(from: number, to: number): void {
    for (let i = from; i < to; i++) {
      if (this.source.charAt(i) === '\n') {
        this.line++;
        this.lineStart = i + 1;
      }
    }
    this.offset = to;
  }

  private push(kind: GoTokenKind, text: string, offset: number): void {
    this.tokens.push({
      kind,
      text,
      line: this.line,
      column: offset - this.lineStart + 1,
      offset,
    });
  }

  private peekChar(): string {
    const codePoint = this.source.codePointAt(this.offset);
    return codePoint === undefined ? '' : String.fromCodePoint(codePoint);
  }

  private advance(count: number): void {
    this.offset = Math.min(this.offset + count, this.source.length);
  }

  private fail(message: string, offset: number): never {
    throw new ParseError(message, this.filePath, this.line, offset - this.lineStart + 1);
  }
}

/**
 * Tokenize Go source.
 */
export function tokenizeGo(source: string, filePath: string): GoLexResult {
  return new GoLexer(source, filePath).tokenize();
}
