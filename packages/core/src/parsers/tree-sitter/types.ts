/**
 * Tree-sitter Types
 *
 * Structural view of the node-tree-sitter API surface the Go parser uses.
 * The native modules are loaded at runtime, so only these shapes are relied on.
 */

export interface TreeSitterPoint {
  row: number;
  column: number;
}

export interface TreeSitterNode {
  type: string;
  text: string;
  isNamed: boolean;
  startPosition: TreeSitterPoint;
  endPosition: TreeSitterPoint;
  startIndex: number;
  endIndex: number;
  parent: TreeSitterNode | null;
  children: TreeSitterNode[];
  namedChildren: TreeSitterNode[];
  previousSibling: TreeSitterNode | null;
  childForFieldName(fieldName: string): TreeSitterNode | null;
}

export interface TreeSitterTree {
  rootNode: TreeSitterNode;
}

/** Opaque language object exported by a grammar package */
export type TreeSitterLanguage = object;

export interface TreeSitterParser {
  setLanguage(language: TreeSitterLanguage): void;
  parse(input: string): TreeSitterTree;
}
