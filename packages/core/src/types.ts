/**
 * Go Source Model
 *
 * Parser-independent view of a Go package: files, their top-level
 * declarations and, for constant declarations, the per-spec names, type,
 * initializers and attached doc text. Both the tree-sitter parser and the
 * fallback declaration parser produce this shape, and nothing downstream
 * looks at a concrete syntax tree.
 */

// ============================================
// Declarations
// ============================================

/** Kind of a spec's explicit type expression */
export type TypeExpressionKind = 'identifier' | 'qualified' | 'other';

/**
 * Explicit type of a constant spec.
 *
 * Only `identifier` (e.g. `StatusCode`) names a type the extractor can match;
 * `qualified` is `pkg.Type`, `other` covers pointers, generics and the rest.
 */
export interface TypeExpression {
  kind: TypeExpressionKind;
  text: string;
}

/** One `Name[, Name] [Type] [= Expr, ...]` line of a const declaration */
export interface ConstSpec {
  /** Bound names, in order */
  names: string[];
  /** Explicit type, or null for an untyped spec */
  type: TypeExpression | null;
  /** Source text of each initializer expression; empty when there is no `=` */
  values: string[];
  /**
   * Text of the spec's leading comment group, or null. Always null outside
   * a group, where the comment belongs to the declaration.
   */
  doc: string | null;
  /** 1-based line of the first name */
  line: number;
}

/** A `const` declaration, either `const X = 1` or a parenthesised group */
export interface ConstDeclaration {
  kind: 'const';
  /** Whether the specs sit inside `const ( ... )` */
  grouped: boolean;
  specs: ConstSpec[];
  /** Doc comment of the declaration itself */
  doc: string | null;
  line: number;
}

/** Keywords of non-constant top-level declarations */
export type OtherDeclarationKeyword = 'import' | 'var' | 'type' | 'func' | 'method';

/**
 * Any other top-level declaration. Only the package-scope names it declares
 * are kept.
 */
export interface OtherDeclaration {
  kind: 'other';
  keyword: OtherDeclarationKeyword;
  names: string[];
  line: number;
}

export type GoDeclaration = ConstDeclaration | OtherDeclaration;

// ============================================
// Files and Packages
// ============================================

/** Which parser produced a file */
export type ParseMethod = 'tree-sitter' | 'fallback';

/** A parsed Go source file */
export interface GoSourceFile {
  path: string;
  packageName: string;
  decls: GoDeclaration[];
}

/** All files of one package found in a directory */
export interface GoPackage {
  name: string;
  dir: string;
  files: GoSourceFile[];
}

// ============================================
// Extraction Results
// ============================================

/** A constant whose effective type matches the target type */
export interface CandidateConstant {
  name: string;
  type: string;
  /** Label source: the spec's doc text, if any */
  doc: string | null;
  file: string;
  line: number;
}

/** Final `(Name, Message)` pair handed to the renderer */
export interface DerivedEntry {
  name: string;
  message: string;
}
