import type { TextBuffer } from '../core/buffer.js';
import type { NodeKind, SyntaxNode, SyntaxTree } from '../core/tree.js';
import type { FileModes, LineBudget, Offense, RuleName } from '../core/types.js';

export interface RuleOptions {
  lineLengthLimit: LineBudget;
}

export interface RuleContext {
  readonly tree: SyntaxTree;
  readonly buffer: TextBuffer;
  readonly modes: FileModes;
  readonly options: RuleOptions;
  /** Path quoted in messages; `<file path>` when the file is not on disk. */
  readonly displayPath: string;
}

export interface Rule {
  readonly name: RuleName;
  readonly code: string;
  /** Node kinds the rule is dispatched on. */
  readonly kinds: readonly NodeKind[];
  check(node: SyntaxNode, ctx: RuleContext): Offense[];
}
