import type { TextBuffer } from './buffer.js';
import type { ArgumentKind, SourceRange } from './types.js';

export type NodeKind =
  | 'program'
  | 'class'
  | 'sclass'
  | 'module'
  | 'def'
  | 'defs'
  | 'send'
  | 'block'
  | 'body'
  | 'params'
  | 'param'
  | 'const'
  | 'sym'
  | 'str'
  | 'lambda'
  | 'expr';

/**
 * A node of the arena. Parent and children are indices into the owning
 * SyntaxTree; `index` is the node's position in its parent's child list.
 */
export interface SyntaxNode {
  readonly id: number;
  readonly kind: NodeKind;
  readonly parent: number | null;
  readonly index: number;
  readonly children: readonly number[];
  readonly begin: number;
  readonly end: number;
  /** def/defs/send: method name; param: parameter name; sym: symbol name */
  readonly name?: string;
  /** send/defs: receiver child id, null when the receiver is implicit */
  readonly receiver?: number | null;
  readonly paramKind?: ArgumentKind;
  /** const: path segments, without a leading `::` */
  readonly path?: readonly string[];
}

export interface NodeInit {
  kind: NodeKind;
  begin: number;
  end: number;
  children?: number[];
  name?: string;
  receiver?: number | null;
  paramKind?: ArgumentKind;
  path?: string[];
}

interface MutableNode {
  id: number;
  kind: NodeKind;
  parent: number | null;
  index: number;
  children: number[];
  begin: number;
  end: number;
  name?: string;
  receiver?: number | null;
  paramKind?: ArgumentKind;
  path?: string[];
}

/** Collects nodes bottom-up; children are attached when their parent is added. */
export class TreeArena {
  private readonly nodes: MutableNode[] = [];

  add(init: NodeInit): number {
    const id = this.nodes.length;
    const children = init.children ?? [];
    const node: MutableNode = {
      id,
      kind: init.kind,
      parent: null,
      index: 0,
      children,
      begin: init.begin,
      end: init.end,
    };
    if (init.name !== undefined) node.name = init.name;
    if (init.receiver !== undefined) node.receiver = init.receiver;
    if (init.paramKind !== undefined) node.paramKind = init.paramKind;
    if (init.path !== undefined) node.path = init.path;
    children.forEach((childId, i) => {
      const child = this.nodes[childId];
      if (!child) throw new Error(`unknown child node ${childId}`);
      child.parent = id;
      child.index = i;
    });
    this.nodes.push(node);
    return id;
  }

  range(id: number): SourceRange {
    const node = this.nodes[id];
    if (!node) throw new Error(`unknown node ${id}`);
    return { begin: node.begin, end: node.end };
  }

  finish(buffer: TextBuffer, root: number): SyntaxTree {
    return new SyntaxTree(buffer, this.nodes, root);
  }
}

export class SyntaxTree {
  constructor(
    readonly buffer: TextBuffer,
    private readonly nodes: readonly SyntaxNode[],
    private readonly rootId: number,
  ) {}

  get root(): SyntaxNode {
    return this.node(this.rootId);
  }

  node(id: number): SyntaxNode {
    const node = this.nodes[id];
    if (!node) throw new Error(`unknown node ${id}`);
    return node;
  }

  parentOf(node: SyntaxNode): SyntaxNode | undefined {
    return node.parent === null ? undefined : this.node(node.parent);
  }

  childrenOf(node: SyntaxNode): SyntaxNode[] {
    return node.children.map((id) => this.node(id));
  }

  childAt(node: SyntaxNode, index: number): SyntaxNode | undefined {
    const id = node.children[index];
    return id === undefined ? undefined : this.node(id);
  }

  *ancestors(node: SyntaxNode): Generator<SyntaxNode> {
    let current = this.parentOf(node);
    while (current) {
      yield current;
      current = this.parentOf(current);
    }
  }

  /** Pre-order walk in document order. */
  *walk(from: SyntaxNode = this.root): Generator<SyntaxNode> {
    const stack: SyntaxNode[] = [from];
    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;
      yield node;
      for (let i = node.children.length - 1; i >= 0; i--) {
        const id = node.children[i];
        if (id !== undefined) stack.push(this.node(id));
      }
    }
  }

  source(node: SyntaxNode): string {
    return this.buffer.slice(node);
  }
}
