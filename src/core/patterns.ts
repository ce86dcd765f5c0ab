import type { SyntaxNode, SyntaxTree } from './tree.js';

const ATTRIBUTE_ACCESSORS = new Set(['attr_reader', 'attr_writer', 'attr_accessor']);

function isImplicitSend(node: SyntaxNode | undefined, name?: string): node is SyntaxNode {
  return !!node && node.kind === 'send' && node.receiver === null && (name === undefined || node.name === name);
}

/** `(block (send nil :sig ...) ...)` */
export function isSignatureBlock(tree: SyntaxTree, node: SyntaxNode | undefined): boolean {
  if (!node || node.kind !== 'block') return false;
  return isImplicitSend(tree.childAt(node, 0), 'sig');
}

/** `(send _ :extend (const (const _ :T) :Sig))` */
export function isCapabilityDeclaration(tree: SyntaxTree, node: SyntaxNode | undefined): boolean {
  if (!node || node.kind !== 'send' || node.name !== 'extend') return false;
  const args = tree.childrenOf(node).filter((child) => child.id !== node.receiver);
  const first = args[0];
  if (args.length !== 1 || !first || first.kind !== 'const' || !first.path) return false;
  const path = first.path;
  return path.length >= 2 && path[path.length - 2] === 'T' && path[path.length - 1] === 'Sig';
}

/** `(send nil {:attr_reader :attr_writer :attr_accessor} ...)` */
export function isAttributeAccessor(node: SyntaxNode | undefined): boolean {
  return isImplicitSend(node) && ATTRIBUTE_ACCESSORS.has(node.name ?? '');
}

export function isMethodDefinition(node: SyntaxNode | undefined): boolean {
  return !!node && (node.kind === 'def' || node.kind === 'defs');
}

/** Anything a `sig` may directly precede. */
export function isSignableDefinition(node: SyntaxNode | undefined): boolean {
  return isMethodDefinition(node) || isAttributeAccessor(node);
}

/**
 * The outermost call a definition is passed to: `memoize` in `memoize def foo`,
 * `private` in `private memoize def foo`.
 */
export function wrappingCall(tree: SyntaxTree, node: SyntaxNode): SyntaxNode | undefined {
  let outermost: SyntaxNode | undefined;
  let current = node;
  let parent = tree.parentOf(current);
  while (parent && parent.kind === 'send' && parent.receiver !== current.id) {
    outermost = parent;
    current = parent;
    parent = tree.parentOf(current);
  }
  return outermost;
}
