import type { Diagnostic, RuleName } from './types.js';
import { coercePos } from './diagnostics.js';

type Common = {
  code?: string;
  hint?: string;
  length?: number;
  rule?: RuleName;
};

export function errorAt(line: number | null | undefined, column: number | null | undefined, message: string, extra: Common = {}): Diagnostic {
  const pos = coercePos(line ?? null, column ?? null, 1, 1);
  return { line: pos.line, column: pos.column, message, severity: 'error', ...extra };
}

export function warningAt(line: number | null | undefined, column: number | null | undefined, message: string, extra: Common = {}): Diagnostic {
  const pos = coercePos(line ?? null, column ?? null, 1, 1);
  return { line: pos.line, column: pos.column, message, severity: 'warning', ...extra };
}
