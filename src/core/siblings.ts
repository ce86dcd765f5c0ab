import type { SyntaxNode, SyntaxTree } from './tree.js';

const SCOPE_KINDS = new Set(['class', 'module', 'sclass']);

export function nextSibling(tree: SyntaxTree, node: SyntaxNode): SyntaxNode | undefined {
  const parent = tree.parentOf(node);
  return parent ? tree.childAt(parent, node.index + 1) : undefined;
}

export function previousSibling(tree: SyntaxTree, node: SyntaxNode): SyntaxNode | undefined {
  const parent = tree.parentOf(node);
  if (!parent || node.index === 0) return undefined;
  return tree.childAt(parent, node.index - 1);
}

/** Nearest enclosing `class`, `module` or `class << self`. */
export function enclosingScope(tree: SyntaxTree, node: SyntaxNode): SyntaxNode | undefined {
  for (const ancestor of tree.ancestors(node)) {
    if (SCOPE_KINDS.has(ancestor.kind)) return ancestor;
  }
  return undefined;
}

/** Direct statements of a scope's body; empty when the body is empty. */
export function scopeStatements(tree: SyntaxTree, scope: SyntaxNode): SyntaxNode[] {
  const body = tree.childrenOf(scope).find((child) => child.kind === 'body');
  return body ? tree.childrenOf(body) : [];
}
