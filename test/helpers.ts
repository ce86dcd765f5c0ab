import type { SyntaxNode, SyntaxTree } from '../src/core/tree.js';
import { parseRuby } from '../src/ruby/index.js';

/** Joins lines into a source text ending in a line break. */
export function rb(...lines: string[]): string {
  return lines.join('\n') + '\n';
}

export function treeOf(text: string): SyntaxTree {
  const parsed = parseRuby(text);
  if (!parsed.tree) throw new Error(parsed.diagnostics.map((d) => `${d.code}: ${d.message}`).join('\n'));
  return parsed.tree;
}

export function findNode(tree: SyntaxTree, predicate: (node: SyntaxNode) => boolean): SyntaxNode {
  for (const node of tree.walk()) {
    if (predicate(node)) return node;
  }
  throw new Error('no matching node');
}

export function findDef(tree: SyntaxTree, name: string): SyntaxNode {
  return findNode(tree, (node) => (node.kind === 'def' || node.kind === 'defs') && node.name === name);
}
