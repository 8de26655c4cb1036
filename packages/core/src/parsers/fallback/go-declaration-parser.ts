/**
 * Go Declaration Parser
 *
 * Fallback parser for when tree-sitter-go is unavailable. Reads the package
 * clause and every top-level declaration from the token stream; constant
 * declarations are parsed spec by spec, everything else is reduced to the
 * names it declares and its body is skipped by bracket depth.
 */

import { ParseError } from '../../errors.js';
import { leadCommentText } from '../comment-text.js';
import { tokenizeGo, type GoToken, type LexedComment } from './go-lexer.js';

import type {
  ConstDeclaration,
  ConstSpec,
  GoDeclaration,
  GoSourceFile,
  OtherDeclaration,
  TypeExpression,
} from '../../types.js';

const OPENING = new Set(['(', '[', '{']);
const CLOSING: Record<string, string> = { ')': '(', ']': '[', '}': '{' };

/**
 * Recursive-descent reader over top-level Go declarations.
 */
export class GoDeclarationParser {
  private readonly tokens: GoToken[];
  private readonly comments: LexedComment[];
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly filePath: string
  ) {
    const lexed = tokenizeGo(source, filePath);
    this.tokens = lexed.tokens;
    this.comments = lexed.comments;
  }

  /**
   * Parse the file into the Go source model.
   *
   * @throws ParseError when the file is not valid at declaration level
   */
  parse(): GoSourceFile {
    this.skipSemicolons();
    this.expectKeyword('package');
    const packageName = this.expectIdent().text;
    this.expectTerminator();

    const decls: GoDeclaration[] = [];
    for (this.skipSemicolons(); this.current.kind !== 'eof'; this.skipSemicolons()) {
      decls.push(this.parseDeclaration());
    }

    return { path: this.filePath, packageName, decls };
  }

  // ==========================================================================
  // Declarations
  // ==========================================================================

  private parseDeclaration(): GoDeclaration {
    const token = this.current;
    if (token.kind !== 'keyword') {
      this.fail(`expected declaration, found ${describe(token)}`, token);
    }

    switch (token.text) {
      case 'const':
        return this.parseConstDeclaration();
      case 'import':
        return this.parseGenericDeclaration('import');
      case 'var':
        return this.parseGenericDeclaration('var');
      case 'type':
        return this.parseGenericDeclaration('type');
      case 'func':
        return this.parseFuncDeclaration();
      default:
        return this.fail(`expected declaration, found ${describe(token)}`, token);
    }
  }

  private parseConstDeclaration(): ConstDeclaration {
    const keyword = this.current;
    const doc = this.docFor(keyword);
    this.index++;

    if (!this.isOp('(')) {
      // The declaration doc stays on the declaration; an ungrouped spec has none
      const spec = this.parseConstSpec(this.takeSpecTokens(false), null);
      this.expectTerminator();
      return { kind: 'const', grouped: false, specs: [spec], doc, line: keyword.line };
    }

    this.index++;
    const specs: ConstSpec[] = [];
    for (this.skipSemicolons(); !this.isOp(')'); this.skipSemicolons()) {
      // Read before the spec's tokens are consumed
      const specDoc = this.docFor(this.current);
      specs.push(this.parseConstSpec(this.takeSpecTokens(true), specDoc));
    }
    this.index++;
    this.expectTerminator();

    return { kind: 'const', grouped: true, specs, doc, line: keyword.line };
  }

  private parseConstSpec(tokens: GoToken[], doc: string | null): ConstSpec {
    const names: string[] = [];
    let position = 0;

    for (;;) {
      const token = tokens[position];
      if (!token || token.kind !== 'ident') {
        return this.fail(`expected identifier, found ${token ? describe(token) : 'newline'}`, token ?? this.current);
      }
      names.push(token.text);
      position++;
      if (tokens[position]?.text !== ',') {
        break;
      }
      position++;
    }

    const rest = tokens.slice(position);
    const assign = indexAtDepthZero(rest, '=');
    const typeTokens = assign < 0 ? rest : rest.slice(0, assign);
    const valueTokens = assign < 0 ? [] : rest.slice(assign + 1);

    if (assign >= 0 && valueTokens.length === 0) {
      const at = rest[assign] ?? this.current;
      this.fail('expected expression', at);
    }

    return {
      names,
      type: typeTokens.length > 0 ? this.typeExpression(typeTokens) : null,
      values: splitAtDepthZero(valueTokens, ',').map((part) => this.sourceText(part)),
      doc,
      line: tokens[0]?.line ?? this.current.line,
    };
  }

  private typeExpression(tokens: GoToken[]): TypeExpression {
    const text = this.sourceText(tokens);
    const [first, second, third] = tokens;

    if (tokens.length === 1 && first?.kind === 'ident') {
      return { kind: 'identifier', text };
    }
    if (tokens.length === 3 && first?.kind === 'ident' && second?.text === '.' && third?.kind === 'ident') {
      return { kind: 'qualified', text };
    }
    return { kind: 'other', text };
  }

  private parseGenericDeclaration(keyword: 'import' | 'var' | 'type'): OtherDeclaration {
    const start = this.current;
    this.index++;

    const specs: GoToken[][] = [];
    if (this.isOp('(')) {
      this.index++;
      for (this.skipSemicolons(); !this.isOp(')'); this.skipSemicolons()) {
        specs.push(this.takeSpecTokens(true));
      }
      this.index++;
    } else {
      specs.push(this.takeSpecTokens(false));
    }
    this.expectTerminator();

    const names = keyword === 'import' ? [] : specs.flatMap((spec) => leadingNames(spec, keyword));
    return { kind: 'other', keyword, names, line: start.line };
  }

  private parseFuncDeclaration(): OtherDeclaration {
    const start = this.current;
    this.index++;

    const isMethod = this.isOp('(');
    if (isMethod) {
      this.skipBalanced();
    }
    const name = this.expectIdent();

    this.takeSpecTokens(false);
    this.expectTerminator();

    return isMethod
      ? { kind: 'other', keyword: 'method', names: [], line: start.line }
      : { kind: 'other', keyword: 'func', names: [name.text], line: start.line };
  }

  // ==========================================================================
  // Token Helpers
  // ==========================================================================

  private get current(): GoToken {
    const token = this.tokens[this.index] ?? this.tokens[this.tokens.length - 1];
    if (!token) {
      throw new ParseError('empty token stream', this.filePath, 1, 1);
    }
    return token;
  }

  /**
   * Collect the tokens of one spec: everything up to a semicolon at bracket
   * depth zero, or up to the closing `)` of the enclosing group.
   */
  private takeSpecTokens(inGroup: boolean): GoToken[] {
    const taken: GoToken[] = [];
    const stack: string[] = [];

    for (;;) {
      const token = this.current;

      if (token.kind === 'eof') {
        if (stack.length > 0 || inGroup) {
          this.fail('unexpected EOF', token);
        }
        return taken;
      }
      if (stack.length === 0 && (token.kind === 'semicolon' || (inGroup && token.text === ')'))) {
        return taken;
      }

      if (token.kind === 'op' && OPENING.has(token.text)) {
        stack.push(token.text);
      } else if (token.kind === 'op') {
        const opener = CLOSING[token.text];
        if (opener !== undefined && stack.pop() !== opener) {
          this.fail(`unexpected ${token.text}`, token);
        }
      }

      taken.push(token);
      this.index++;
    }
  }

  /** Skip a bracketed run starting at the current opening bracket */
  private skipBalanced(): void {
    const stack: string[] = [];
    do {
      const token = this.current;
      if (token.kind === 'eof') {
        this.fail('unexpected EOF', token);
      }
      if (token.kind === 'op' && OPENING.has(token.text)) {
        stack.push(token.text);
      } else if (token.kind === 'op' && CLOSING[token.text] !== undefined) {
        if (stack.pop() !== CLOSING[token.text]) {
          this.fail(`unexpected ${token.text}`, token);
        }
      }
      this.index++;
    } while (stack.length > 0);
  }

  private skipSemicolons(): void {
    while (this.current.kind === 'semicolon') {
      this.index++;
    }
  }

  private isOp(text: string): boolean {
    return this.current.kind === 'op' && this.current.text === text;
  }

  private expectKeyword(text: string): GoToken {
    const token = this.current;
    if (token.kind !== 'keyword' || token.text !== text) {
      this.fail(`expected '${text}', found ${describe(token)}`, token);
    }
    this.index++;
    return token;
  }

  private expectIdent(): GoToken {
    const token = this.current;
    if (token.kind !== 'ident') {
      this.fail(`expected identifier, found ${describe(token)}`, token);
    }
    this.index++;
    return token;
  }

  private expectTerminator(): void {
    const token = this.current;
    if (token.kind === 'eof') {
      return;
    }
    if (token.kind !== 'semicolon') {
      this.fail(`expected ';', found ${describe(token)}`, token);
    }
    this.index++;
  }

  /** Doc comment attached to a token */
  private docFor(token: GoToken): string | null {
    const previous = this.tokens[this.index - 1];
    // An inserted semicolon sits on the newline and covers no text
    const lowerBound = !previous
      ? 0
      : previous.kind === 'semicolon' && previous.text === '\n'
        ? previous.offset
        : previous.offset + previous.text.length;
    const between = this.comments.filter(
      (comment) => comment.offset >= lowerBound && comment.offset < token.offset
    );
    return leadCommentText(between, previous ? previous.line : null, token.line);
  }

  /** Exact source text covered by a token run */
  private sourceText(tokens: GoToken[]): string {
    const first = tokens[0];
    const last = tokens[tokens.length - 1];
    if (!first || !last) {
      return '';
    }
    return this.source.slice(first.offset, last.offset + last.text.length);
  }

  private fail(message: string, token: GoToken): never {
    throw new ParseError(message, this.filePath, token.line, token.column);
  }
}

// ============================================
// Helpers
// ============================================

function describe(token: GoToken): string {
  if (token.kind === 'eof') {
    return 'EOF';
  }
  if (token.kind === 'semicolon') {
    return token.text === '\n' ? 'newline' : "';'";
  }
  return `'${token.text}'`;
}

/** Index of the first `text` token outside any brackets */
function indexAtDepthZero(tokens: GoToken[], text: string): number {
  let depth = 0;
  for (const [i, token] of tokens.entries()) {
    if (token.kind !== 'op') {
      continue;
    }
    if (OPENING.has(token.text)) {
      depth++;
    } else if (CLOSING[token.text] !== undefined) {
      depth--;
    } else if (depth === 0 && token.text === text) {
      return i;
    }
  }
  return -1;
}

/** Split a token run at `separator` tokens outside any brackets */
function splitAtDepthZero(tokens: GoToken[], separator: string): GoToken[][] {
  const parts: GoToken[][] = [];
  let rest = tokens;

  while (rest.length > 0) {
    const at = indexAtDepthZero(rest, separator);
    if (at < 0) {
      parts.push(rest);
      break;
    }
    parts.push(rest.slice(0, at));
    rest = rest.slice(at + 1);
  }

  return parts;
}

/** Package-scope names declared by a `var` or `type` spec */
function leadingNames(spec: GoToken[], keyword: 'var' | 'type'): string[] {
  const names: string[] = [];
  // Names alternate with commas: `a, b, c T`
  for (let i = 0; i < spec.length; i += 2) {
    const token = spec[i];
    if (token?.kind !== 'ident') {
      break;
    }
    names.push(token.text);
    if (keyword === 'type' || spec[i + 1]?.text !== ',') {
      break;
    }
  }
  return names;
}

/**
 * Parse one Go file with the fallback parser.
 */
export function parseGoDeclarations(source: string, filePath: string): GoSourceFile {
  return new GoDeclarationParser(source, filePath).parse();
}
