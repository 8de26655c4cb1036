/**
 * Tree-sitter Go Parser
 *
 * Maps a tree-sitter-go syntax tree onto the Go source model: the package
 * clause plus every top-level declaration, with constant specs carrying
 * their names, type, initializers and attached doc comment.
 */

import { leadCommentText, type GoComment } from '../comment-text.js';
import { createGoParser, getGoLoadingError, isGoTreeSitterAvailable } from './go-loader.js';

import type {
  ConstDeclaration,
  ConstSpec,
  GoDeclaration,
  GoSourceFile,
  TypeExpression,
} from '../../types.js';
import type { TreeSitterNode, TreeSitterParser } from './types.js';

// ============================================
// Types
// ============================================

/** Outcome of a tree-sitter parse */
export type TreeSitterGoResult =
  | { success: true; file: GoSourceFile }
  | { success: false; message: string; line: number; column: number };

// ============================================
// Parser Class
// ============================================

/**
 * Go parser backed by tree-sitter-go.
 */
export class TreeSitterGoParser {
  private parser: TreeSitterParser | null = null;
  private initError: string | null = null;

  /**
   * Check if the parser is available.
   */
  isAvailable(): boolean {
    return isGoTreeSitterAvailable();
  }

  /**
   * Get the initialization error if parser is not available.
   */
  getError(): string | null {
    return this.initError ?? getGoLoadingError();
  }

  /**
   * Initialize the parser. Returns false when tree-sitter cannot be used.
   */
  initialize(): boolean {
    if (this.parser) {
      return true;
    }

    if (!isGoTreeSitterAvailable()) {
      this.initError = getGoLoadingError() ?? 'tree-sitter-go not available';
      return false;
    }

    try {
      this.parser = createGoParser();
      return true;
    } catch (error) {
      this.initError = error instanceof Error ? error.message : 'Failed to create Go parser';
      return false;
    }
  }

  /**
   * Parse Go source into the source model.
   */
  parse(source: string, filePath: string): TreeSitterGoResult {
    if (!this.initialize() || !this.parser) {
      return failure(this.initError ?? 'Parser not initialized');
    }

    const root = this.parser.parse(source).rootNode;

    const errorNode = findErrorNode(root);
    if (errorNode) {
      return failure(
        `syntax error near '${firstLine(errorNode.text)}'`,
        errorNode.startPosition.row + 1,
        errorNode.startPosition.column + 1
      );
    }

    const packageClause = root.children.find((child) => child.type === 'package_clause');
    const packageName = packageClause?.namedChildren.find((child) => child.type === 'package_identifier');
    if (!packageName) {
      return failure('expected package clause', 1, 1);
    }

    const decls: GoDeclaration[] = [];
    for (const child of root.children) {
      const decl = this.extractDeclaration(child);
      if (decl) {
        decls.push(decl);
      }
    }

    return { success: true, file: { path: filePath, packageName: packageName.text, decls } };
  }

  // ============================================
  // Extraction Methods
  // ============================================

  private extractDeclaration(node: TreeSitterNode): GoDeclaration | null {
    const line = node.startPosition.row + 1;

    switch (node.type) {
      case 'const_declaration':
        return this.extractConstDeclaration(node);
      case 'var_declaration':
        return {
          kind: 'other',
          keyword: 'var',
          names: descendantsOfType(node, 'var_spec').flatMap(specNames),
          line,
        };
      case 'type_declaration':
        return {
          kind: 'other',
          keyword: 'type',
          names: node.namedChildren
            .filter((child) => child.type === 'type_spec' || child.type === 'type_alias')
            .map((child) => child.childForFieldName('name')?.text ?? '')
            .filter((name) => name !== ''),
          line,
        };
      case 'function_declaration': {
        const name = node.childForFieldName('name');
        return { kind: 'other', keyword: 'func', names: name ? [name.text] : [], line };
      }
      case 'method_declaration':
        return { kind: 'other', keyword: 'method', names: [], line };
      case 'import_declaration':
        return { kind: 'other', keyword: 'import', names: [], line };
      default:
        return null;
    }
  }

  private extractConstDeclaration(node: TreeSitterNode): ConstDeclaration {
    const grouped = node.children.some((child) => child.type === '(');
    const doc = docFor(node);
    // Only grouped specs carry a doc of their own
    const specs = node.namedChildren
      .filter((child) => child.type === 'const_spec')
      .map((spec) => this.extractConstSpec(spec, grouped ? docFor(spec) : null));

    return { kind: 'const', grouped, specs, doc, line: node.startPosition.row + 1 };
  }

  private extractConstSpec(node: TreeSitterNode, doc: string | null): ConstSpec {
    const typeNode = node.childForFieldName('type');
    const valueNode = node.childForFieldName('value');

    return {
      names: specNames(node),
      type: typeNode ? toTypeExpression(typeNode) : null,
      values: valueNode
        ? valueNode.namedChildren.filter((child) => child.type !== 'comment').map((child) => child.text)
        : [],
      doc,
      line: node.startPosition.row + 1,
    };
  }
}

// ============================================
// Helpers
// ============================================

function failure(message: string, line = 1, column = 1): TreeSitterGoResult {
  return { success: false, message, line, column };
}

function firstLine(text: string): string {
  const line = text.split('\n')[0] ?? '';
  return line.length > 40 ? `${line.slice(0, 40)}...` : line;
}

function findErrorNode(node: TreeSitterNode): TreeSitterNode | null {
  if (node.type === 'ERROR') {
    return node;
  }
  for (const child of node.children) {
    const found = findErrorNode(child);
    if (found) {
      return found;
    }
  }
  return null;
}

function descendantsOfType(node: TreeSitterNode, type: string): TreeSitterNode[] {
  const found: TreeSitterNode[] = [];
  for (const child of node.namedChildren) {
    if (child.type === type) {
      found.push(child);
    } else {
      found.push(...descendantsOfType(child, type));
    }
  }
  return found;
}

/** Names bound by a const or var spec, in order */
function specNames(spec: TreeSitterNode): string[] {
  return spec.children
    .filter((child) => child.type === 'identifier' || child.type === 'blank_identifier')
    .map((child) => child.text);
}

function toTypeExpression(node: TreeSitterNode): TypeExpression {
  switch (node.type) {
    case 'type_identifier':
      return { kind: 'identifier', text: node.text };
    case 'qualified_type':
      return { kind: 'qualified', text: node.text };
    default:
      return { kind: 'other', text: node.text };
  }
}

/**
 * Doc comment of a node: the comment siblings directly before it, measured
 * against the line of the previous non-comment sibling.
 */
function docFor(node: TreeSitterNode): string | null {
  const comments: GoComment[] = [];
  let sibling = node.previousSibling;

  while (sibling?.type === 'comment') {
    comments.unshift({
      text: sibling.text,
      line: sibling.startPosition.row + 1,
      endLine: sibling.endPosition.row + 1,
    });
    sibling = sibling.previousSibling;
  }

  // A newline terminator ends on the following line; its own line is where it starts
  const prevLine = sibling
    ? (sibling.type === '\n' ? sibling.startPosition.row : sibling.endPosition.row) + 1
    : null;

  return leadCommentText(comments, prevLine, node.startPosition.row + 1);
}
