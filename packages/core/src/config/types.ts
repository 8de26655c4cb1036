/**
 * Configuration Types
 */

/** Formatter applied to generated source */
export type FormatterKind = 'builtin' | 'gofmt';

/** Compiles-cleanly gate run before extraction */
export type CheckerKind = 'declarations' | 'go-vet' | 'none';

export interface ParserConfig {
  /** Try tree-sitter-go first */
  enableTreeSitter: boolean;
  /** Use the fallback declaration parser when tree-sitter cannot parse a file */
  enableFallback: boolean;
}

export interface DocstringerConfig {
  parser: ParserConfig;
  formatter: FormatterKind;
  checker: CheckerKind;
  /** Glob patterns (relative to the package directory) of Go files to skip */
  exclude: string[];
}

/** Partial configuration as read from a file or the environment */
export interface PartialDocstringerConfig {
  parser?: Partial<ParserConfig>;
  formatter?: FormatterKind;
  checker?: CheckerKind;
  exclude?: string[];
}
