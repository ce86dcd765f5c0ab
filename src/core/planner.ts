import { isAttributeAccessor, isCapabilityDeclaration, wrappingCall } from './patterns.js';
import { insertBefore } from './rangeEditor.js';
import { enclosingScope, scopeStatements } from './siblings.js';
import { synthesizeSignature } from './signature.js';
import type { SyntaxNode, SyntaxTree } from './tree.js';
import type { ArgumentDescriptor, Edit, IndentationContext, LineBudget } from './types.js';

export const CAPABILITY_DECLARATION = 'extend T::Sig';

/** Signatures go above the outermost form, e.g. `private` in `private memoize def foo`. */
export function nodeToDecorate(tree: SyntaxTree, method: SyntaxNode): SyntaxNode {
  return wrappingCall(tree, method) ?? method;
}

export function indentationFor(tree: SyntaxTree, method: SyntaxNode): IndentationContext {
  const { begin } = nodeToDecorate(tree, method);
  return { column: tree.buffer.columnOf(begin), text: tree.buffer.indentBefore(begin) };
}

function flattenParams(tree: SyntaxTree, node: SyntaxNode, out: ArgumentDescriptor[]): void {
  for (const child of tree.childrenOf(node)) {
    if (child.kind !== 'param') continue;
    if (child.paramKind === 'destructured') {
      flattenParams(tree, child, out);
    } else if (child.name && child.paramKind) {
      out.push({ name: child.name, kind: child.paramKind });
    }
  }
}

/**
 * Parameters of a definition in declaration order. Destructured groups are
 * flattened; anonymous splats are skipped. `attr_writer :a` yields `a`.
 */
export function argumentDescriptors(tree: SyntaxTree, method: SyntaxNode): ArgumentDescriptor[] {
  const out: ArgumentDescriptor[] = [];
  if (isAttributeAccessor(method)) {
    if (method.name !== 'attr_writer') return out;
    for (const arg of tree.childrenOf(method)) {
      if (arg.kind === 'sym' && arg.name) out.push({ name: arg.name, kind: 'positional' });
    }
    return out;
  }
  const params = tree.childrenOf(method).find((child) => child.kind === 'params');
  if (params) flattenParams(tree, params, out);
  return out;
}

/** Name shown in messages: the method name, or the accessor's attribute names. */
export function methodLabel(tree: SyntaxTree, method: SyntaxNode): string {
  if (isAttributeAccessor(method)) {
    const names = tree
      .childrenOf(method)
      .filter((arg) => arg.kind === 'sym' && arg.name)
      .map((arg) => arg.name);
    return names.join(', ');
  }
  return method.name ?? '';
}

export function hasCapability(tree: SyntaxTree, scope: SyntaxNode): boolean {
  return scopeStatements(tree, scope).some((statement) => isCapabilityDeclaration(tree, statement));
}

export function signatureEdit(tree: SyntaxTree, method: SyntaxNode, budget: LineBudget): Edit {
  const target = nodeToDecorate(tree, method);
  const indentation = indentationFor(tree, method);
  const signature = synthesizeSignature(argumentDescriptors(tree, method), budget, indentation);
  return insertBefore(tree.buffer, target, `${indentation.text}${signature}\n`, indentation.text);
}

/**
 * `extend T::Sig` as the first statement of the enclosing scope. Undefined at
 * top level, for an empty scope, when the scope already declares it, or when
 * the first statement shares its line with other code.
 */
export function capabilityEdit(tree: SyntaxTree, method: SyntaxNode): Edit | undefined {
  const scope = enclosingScope(tree, method);
  if (!scope || hasCapability(tree, scope)) return undefined;
  const first = scopeStatements(tree, scope)[0];
  if (!first || !tree.buffer.isFirstOnLine(first.begin)) return undefined;
  const indent = tree.buffer.indentBefore(first.begin);
  return insertBefore(tree.buffer, first, `${indent}${CAPABILITY_DECLARATION}\n\n`, indent);
}

export interface PlanOptions {
  budget: LineBudget;
  /** Add `extend T::Sig` when the scope lacks it. */
  declareCapability: boolean;
}

/** Edits for one method missing its signature; the declaration comes first. */
export function planCorrections(tree: SyntaxTree, method: SyntaxNode, options: PlanOptions): Edit[] {
  const edits: Edit[] = [];
  if (options.declareCapability) {
    const declaration = capabilityEdit(tree, method);
    if (declaration) edits.push(declaration);
  }
  edits.push(signatureEdit(tree, method, options.budget));
  return edits;
}
