import type { SyntaxNode } from './tree.js';

export interface Diagnostic {
  line: number;
  column: number;
  message: string;
  severity: 'error' | 'warning';
  code?: string;
  rule?: RuleName;
  hint?: string;
  length?: number;
}

export type RuleName = 'methods-should-have-signatures' | 'empty-line-after-sig';

export const RULE_NAMES: readonly RuleName[] = ['methods-should-have-signatures', 'empty-line-after-sig'];

export function isRuleName(value: string): value is RuleName {
  return RULE_NAMES.some((name) => name === value);
}

export interface SourceRange {
  readonly begin: number;
  readonly end: number; // exclusive
}

// Text edits are always expressed against the original buffer
export type Edit =
  | { readonly kind: 'insert-before'; readonly anchor: number; readonly text: string }
  | { readonly kind: 'replace-range'; readonly begin: number; readonly end: number; readonly text: string }
  | { readonly kind: 'remove'; readonly begin: number; readonly end: number };

export interface Offense {
  readonly rule: RuleName;
  readonly code: string;
  readonly node: SyntaxNode;
  readonly range: SourceRange;
  readonly message: string;
  readonly corrections: readonly Edit[];
}

export type ArgumentKind = 'positional' | 'keyword' | 'rest' | 'block' | 'destructured';

export interface ArgumentDescriptor {
  readonly name: string;
  readonly kind: ArgumentKind;
}

export interface IndentationContext {
  /** Width of everything before the signature's first line. */
  readonly column: number;
  /** Prefix for the signature's later lines; tabs are kept. */
  readonly text: string;
}

/** Maximum line width for synthesized signatures; null means unbounded. */
export type LineBudget = number | null;

export interface FileModes {
  strict: boolean;
  signaturesEnabled: boolean;
}

// Line/column edits for editor-facing consumers (1-based)
export interface PositionLC { line: number; column: number }
export interface TextEditLC {
  // Inclusive start; if end is omitted, this is an insertion
  start: PositionLC;
  end?: PositionLC; // exclusive end; if provided, replaced with newText
  newText: string;
}
