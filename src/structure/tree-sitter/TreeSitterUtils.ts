/**
 * Shared tree-sitter utilities for structural analysis.
 * Traversal, text extraction and syntax error detection.
 */

import Parser from 'tree-sitter';

/**
 * Context for tree-sitter parsing operations.
 */
export interface TreeSitterContext {
  /** The tree-sitter parser instance */
  parser: Parser;
  /** The parsed syntax tree */
  tree: Parser.Tree;
  /** The source code being parsed */
  sourceCode: string;
  /** Source code split by lines (for line extraction) */
  lines: string[];
}

/** tree-sitter's default input buffer; larger sources need a bigger one. */
const MIN_BUFFER_SIZE = 32 * 1024;

/**
 * Creates a tree-sitter parsing context.
 */
export function createContext(
  parser: Parser,
  sourceCode: string
): TreeSitterContext {
  const tree = parser.parse(sourceCode, undefined, {
    bufferSize: Math.max(MIN_BUFFER_SIZE, sourceCode.length * 2),
  });
  return {
    parser,
    tree,
    sourceCode,
    lines: sourceCode.split('\n'),
  };
}

/**
 * Gets the source text of a syntax node.
 */
export function getNodeText(
  node: Parser.SyntaxNode,
  sourceCode: string
): string {
  return sourceCode.slice(node.startIndex, node.endIndex);
}

/**
 * Gets the 1-based line a node starts on.
 */
export function getStartLine(node: Parser.SyntaxNode): number {
  return node.startPosition.row + 1;
}

/**
 * Finds all descendant nodes matching the given types.
 */
export function findNodesOfType(
  root: Parser.SyntaxNode,
  types: string[]
): Parser.SyntaxNode[] {
  const results: Parser.SyntaxNode[] = [];
  const typeSet = new Set(types);

  walkTree(root, (node) => {
    if (typeSet.has(node.type)) {
      results.push(node);
    }
  });

  return results;
}

/**
 * Walks the AST depth-first, calling the callback for each node.
 */
export function walkTree(
  node: Parser.SyntaxNode,
  callback: (node: Parser.SyntaxNode) => void
): void {
  callback(node);
  for (const child of node.children) {
    walkTree(child, callback);
  }
}

/**
 * Finds the closest ancestor node matching one of the given types.
 */
export function getParentOfType(
  node: Parser.SyntaxNode,
  types: string[]
): Parser.SyntaxNode | null {
  const typeSet = new Set(types);
  let current = node.parent;

  while (current) {
    if (typeSet.has(current.type)) {
      return current;
    }
    current = current.parent;
  }

  return null;
}

/**
 * Whether the tree contains ERROR nodes or zero-width tokens the
 * parser inserted to recover (missing nodes).
 */
export function hasSyntaxErrors(root: Parser.SyntaxNode): boolean {
  let found = false;
  walkTree(root, (node) => {
    if (found) return;
    if (node.type === 'ERROR') {
      found = true;
      return;
    }
    const isLeaf = node.childCount === 0;
    if (isLeaf && node.parent !== null && node.startIndex === node.endIndex) {
      found = true;
    }
  });
  return found;
}
