/**
 * Formatter - Final gate on generated source
 *
 * `builtin` checks the text with the Go lexer and declaration parser (and
 * tree-sitter when it loads) and normalises whitespace. `gofmt` pipes the
 * text through the gofmt binary.
 */

import { FormatError, ParseError, toError } from '../errors.js';
import { defaultCommandRunner, type CommandResult, type CommandRunner } from '../exec/command-runner.js';
import { parseGoDeclarations } from '../parsers/fallback/go-declaration-parser.js';
import { tokenizeGo } from '../parsers/fallback/go-lexer.js';
import { TreeSitterGoParser } from '../parsers/tree-sitter/tree-sitter-go-parser.js';

import type { FormatterKind } from '../config/types.js';

export interface GoFormatter {
  readonly kind: FormatterKind;
  /**
   * @throws FormatError when the source is not valid Go
   */
  format(source: string, fileName: string): Promise<string>;
}

const CLOSERS: Readonly<Record<string, string>> = { ')': '(', ']': '[', '}': '{' };

/**
 * Normalise line endings, drop trailing whitespace and end with one newline
 */
export function normalizeWhitespace(source: string): string {
  const lines = source
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(/[ \t]+$/, ''));
  while (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return `${lines.join('\n')}\n`;
}

function checkBrackets(source: string, fileName: string): void {
  const stack: string[] = [];
  for (const token of tokenizeGo(source, fileName).tokens) {
    if (token.kind !== 'op') {continue;}
    if (token.text === '(' || token.text === '[' || token.text === '{') {
      stack.push(token.text);
      continue;
    }
    const opener = CLOSERS[token.text];
    if (opener === undefined) {continue;}
    if (stack.pop() !== opener) {
      throw new ParseError(`unexpected ${token.text}`, fileName, token.line, token.column);
    }
  }
  if (stack.length > 0) {
    throw new ParseError(`unclosed ${stack[stack.length - 1] ?? ''}`, fileName, 1, 1);
  }
}

/**
 * Formatter that needs no Go toolchain
 */
export class BuiltinGoFormatter implements GoFormatter {
  readonly kind = 'builtin';
  private readonly treeSitter: TreeSitterGoParser | null;

  constructor(useTreeSitter = true) {
    this.treeSitter = useTreeSitter ? new TreeSitterGoParser() : null;
  }

  async format(source: string, fileName: string): Promise<string> {
    const normalized = normalizeWhitespace(source);

    try {
      checkBrackets(normalized, fileName);
      parseGoDeclarations(normalized, fileName);
    } catch (error) {
      const cause = toError(error);
      throw new FormatError('generated source is not valid Go', cause.message, cause);
    }

    if (this.treeSitter?.isAvailable()) {
      const result = this.treeSitter.parse(normalized, fileName);
      if (!result.success) {
        throw new FormatError(
          'generated source is not valid Go',
          `${fileName}:${result.line}:${result.column}: ${result.message}`
        );
      }
    }

    return normalized;
  }
}

/**
 * Formatter that shells out to gofmt
 */
export class GofmtFormatter implements GoFormatter {
  readonly kind = 'gofmt';

  constructor(
    private readonly runner: CommandRunner = defaultCommandRunner,
    private readonly binary = 'gofmt'
  ) {}

  async format(source: string, fileName: string): Promise<string> {
    let result: CommandResult;
    try {
      result = await this.runner.run(this.binary, [], { input: source });
    } catch (error) {
      const cause = toError(error);
      throw new FormatError(`failed to run ${this.binary}`, cause.message, cause);
    }

    if (result.exitCode !== 0) {
      // gofmt reports positions against <standard input>
      const diagnostic = result.stderr.trim().replaceAll('<standard input>', fileName);
      throw new FormatError(
        'generated source is not valid Go',
        diagnostic || `${this.binary} exited with ${String(result.exitCode)}`
      );
    }

    return result.stdout;
  }
}

export interface FormatterOptions {
  useTreeSitter?: boolean | undefined;
  runner?: CommandRunner | undefined;
}

export function createFormatter(kind: FormatterKind, options: FormatterOptions = {}): GoFormatter {
  switch (kind) {
    case 'builtin':
      return new BuiltinGoFormatter(options.useTreeSitter ?? true);
    case 'gofmt':
      return new GofmtFormatter(options.runner);
  }
}
