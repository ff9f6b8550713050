import Parser from 'tree-sitter';
import Python from 'tree-sitter-python';

export type SyntaxNode = Parser.SyntaxNode;
export type SyntaxTree = Parser.Tree;

const parser = new Parser();
parser.setLanguage(Python);

const CHUNK_SIZE = 16 * 1024;

/**
 * Parse Python source into a tree-sitter tree. Source is handed to the
 * parser in chunks through the callback input, which sidesteps the fixed
 * buffer the string overload uses.
 */
export function parsePython(source: string): SyntaxTree {
  return parser.parse((index: number) => (index < source.length ? source.slice(index, index + CHUNK_SIZE) : null));
}

/**
 * Visit named nodes top-down. `visit` returns the context the node's
 * children are visited with, or undefined to leave the children alone.
 * Context travels down as a value; nothing is written onto the nodes.
 */
export function walkTree<C>(node: SyntaxNode, context: C, visit: (node: SyntaxNode, context: C) => C | undefined): void {
  const childContext = visit(node, context);
  if (childContext === undefined) return;
  for (const child of node.namedChildren) {
    walkTree(child, childContext, visit);
  }
}

export function lineRange(node: SyntaxNode): { line_start: number; line_end: number } {
  return { line_start: node.startPosition.row + 1, line_end: node.endPosition.row + 1 };
}

/** Zero-width nodes are tokens the parser inserted to recover from an error. */
export function isMissingNode(node: SyntaxNode): boolean {
  return node.startIndex === node.endIndex;
}

export function containsError(node: SyntaxNode): boolean {
  if (node.type === 'ERROR' || isMissingNode(node)) return true;
  return node.children.some(containsError);
}

/** Source text with runs of whitespace collapsed to single spaces. */
export function flatText(node: SyntaxNode): string {
  return node.text.replace(/\s+/g, ' ').trim();
}
