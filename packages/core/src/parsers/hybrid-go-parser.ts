/**
 * Hybrid Go Parser
 *
 * Tree-sitter first, fallback declaration parser second. Follows the hybrid
 * extractor pattern: a tree-sitter result with syntax errors, or a
 * tree-sitter failure, is retried on the fallback when it is enabled.
 */

import { ParseError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import { parseGoDeclarations } from './fallback/go-declaration-parser.js';
import { TreeSitterGoParser } from './tree-sitter/tree-sitter-go-parser.js';

import type { ParserConfig } from '../config/types.js';
import type { GoSourceFile, ParseMethod } from '../types.js';

/** A parsed file and how it was parsed */
export interface ParsedGoFile {
  file: GoSourceFile;
  method: ParseMethod;
  warnings: string[];
}

/** Anything that turns Go source into the source model */
export interface GoFileParser {
  parseFile(source: string, filePath: string): ParsedGoFile;
}

export const DEFAULT_PARSER_CONFIG: ParserConfig = {
  enableTreeSitter: true,
  enableFallback: true,
};

/**
 * Go parser combining tree-sitter with the fallback declaration parser.
 */
export class HybridGoParser implements GoFileParser {
  private readonly config: ParserConfig;
  private readonly treeSitter: TreeSitterGoParser;
  private readonly logger: Logger;

  constructor(config?: Partial<ParserConfig>, logger: Logger = silentLogger) {
    this.config = { ...DEFAULT_PARSER_CONFIG, ...config };
    this.treeSitter = new TreeSitterGoParser();
    this.logger = logger;
  }

  /**
   * Whether tree-sitter will be tried for each file
   */
  usesTreeSitter(): boolean {
    return this.config.enableTreeSitter && this.treeSitter.isAvailable();
  }

  /**
   * Parse one Go file. CRLF line endings are read as LF.
   *
   * @throws ParseError when no enabled parser accepts the file
   */
  parseFile(rawSource: string, filePath: string): ParsedGoFile {
    const source = rawSource.replace(/\r\n/g, '\n');
    const warnings: string[] = [];

    if (this.config.enableTreeSitter) {
      if (this.treeSitter.isAvailable()) {
        const result = this.treeSitter.parse(source, filePath);
        if (result.success) {
          this.logger.debug(`${filePath}: parsed with tree-sitter`);
          return { file: result.file, method: 'tree-sitter', warnings };
        }

        if (!this.config.enableFallback) {
          throw new ParseError(result.message, filePath, result.line, result.column);
        }
        warnings.push(`Tree-sitter fallback: ${result.message} at ${result.line}:${result.column}`);
      } else {
        warnings.push(`Tree-sitter fallback: ${this.treeSitter.getError() ?? 'tree-sitter unavailable'}`);
      }
    }

    if (!this.config.enableFallback) {
      throw new ParseError(`no usable Go parser (${warnings[0] ?? 'all parsers disabled'})`, filePath, 1, 1);
    }

    const file = parseGoDeclarations(source, filePath);
    this.logger.debug(`${filePath}: parsed with fallback parser`);
    return { file, method: 'fallback', warnings };
  }
}

/**
 * Create a hybrid Go parser
 */
export function createGoFileParser(config?: Partial<ParserConfig>, logger?: Logger): HybridGoParser {
  return new HybridGoParser(config, logger);
}
