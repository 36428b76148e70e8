/**
 * AST Visitor
 * Recursive traversal with enter/exit callbacks, plus the queries built on it.
 */

import type { ExpressionNode, IdentifierNode } from '../ast-nodes.js';

// ============================================================
// VISITOR INTERFACE
// ============================================================

export interface NodeVisitor {
  /** Called before visiting node's children */
  enter?(node: ExpressionNode, parent: ExpressionNode | null): void;
  /** Called after visiting node's children */
  exit?(node: ExpressionNode, parent: ExpressionNode | null): void;
}

/** Direct children in source order */
export function childrenOf(node: ExpressionNode): ExpressionNode[] {
  switch (node.type) {
    case 'Nil':
    case 'Numeric':
    case 'Logical':
    case 'String':
    case 'DateTime':
    case 'Identifier':
      return [];
    case 'Operation':
      return [node.left, node.right];
    case 'Negation':
      return [node.operand];
    case 'Function':
      return [...node.args];
    case 'Access':
      return [node.container, node.index];
    case 'Case': {
      const children: ExpressionNode[] = [];
      if (node.switch) children.push(node.switch);
      for (const branch of node.branches) {
        children.push(branch.when, branch.then);
      }
      if (node.else) children.push(node.else);
      return children;
    }
  }
}

/**
 * Visit a tree depth-first.
 *
 * Traversal order:
 * 1. visitor.enter(node)
 * 2. Recurse into children
 * 3. visitor.exit(node)
 */
export function visitNode(
  node: ExpressionNode,
  visitor: NodeVisitor,
  parent: ExpressionNode | null = null
): void {
  visitor.enter?.(node, parent);
  for (const child of childrenOf(node)) {
    visitNode(child, visitor, node);
  }
  visitor.exit?.(node, parent);
}

// ============================================================
// QUERIES
// ============================================================

/** Compare two identifier references by their comparison keys */
export function identifiersEqual(a: IdentifierNode, b: IdentifierNode): boolean {
  return a.key === b.key;
}

/** Identifier names an expression depends on, first occurrence wins */
export function dependencies(node: ExpressionNode): string[] {
  const seen = new Set<string>();
  const names: string[] = [];

  visitNode(node, {
    enter(current) {
      if (current.type !== 'Identifier' || seen.has(current.key)) return;
      seen.add(current.key);
      names.push(current.name);
    },
  });

  return names;
}
