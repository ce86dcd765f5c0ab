// Public SDK surface for programmatic use
// Re-export core types
export type {
  Diagnostic,
  RuleName,
  SourceRange,
  Edit,
  Offense,
  ArgumentDescriptor,
  ArgumentKind,
  IndentationContext,
  LineBudget,
  FileModes,
  PositionLC,
  TextEditLC,
} from './core/types.js';
export { RULE_NAMES, isRuleName } from './core/types.js';

// Text and tree
export { TextBuffer } from './core/buffer.js';
export type { NodeKind, SyntaxNode } from './core/tree.js';
export { SyntaxTree, TreeArena } from './core/tree.js';
export { parseRuby } from './ruby/index.js';
export { detectFileModes } from './core/modes.js';

// Matching, editing and synthesis
export * from './core/patterns.js';
export { nextSibling, previousSibling, enclosingScope, scopeStatements } from './core/siblings.js';
export { linesBetween, collapse, preservedText, insertBefore } from './core/rangeEditor.js';
export { synthesizeSignature, singleLineSignature, multiLineSignature } from './core/signature.js';
export { planCorrections, nodeToDecorate, argumentDescriptors, CAPABILITY_DECLARATION } from './core/planner.js';
export { EditConflictError, applyEdits, mergeEdits, collectEdits, toTextEditLC } from './core/edits.js';

// Rules and linting
export { ALL_RULES, runRules } from './rules/index.js';
export type { Rule, RuleContext, RuleOptions } from './rules/index.js';
export { lintRuby } from './core/pipeline.js';
export type { LintOptions, LintResult } from './core/pipeline.js';
export { loadConfig, parseConfig, defaultConfig, ConfigError, ConfigSchema } from './core/config.js';
export type { RbsigConfig } from './core/config.js';

// Formatting
export { textReport, toJsonResult } from './core/format.js';

// Convenience: multi-pass fix for a single file's text
import type { Diagnostic } from './core/types.js';
import { lintRuby as lint, type LintOptions as Opts } from './core/pipeline.js';
import { applyEdits as apply, collectEdits as collect } from './core/edits.js';

export const MAX_FIX_PASSES = 5;

/**
 * Lint and apply every correction repeatedly until stable (max 5 passes).
 * Returns the final text and the diagnostics that remain after fixing.
 * Throws EditConflictError when two corrections overlap.
 */
export function fixRuby(text: string, options: Opts = {}): { fixed: string; diagnostics: Diagnostic[] } {
  let current = text;
  for (let i = 0; i < MAX_FIX_PASSES; i++) {
    const res = lint(current, options);
    const edits = collect(res.offenses);
    if (edits.length === 0) return { fixed: current, diagnostics: res.diagnostics };
    const next = apply(res.buffer, edits);
    if (next === current) return { fixed: current, diagnostics: res.diagnostics };
    current = next;
  }
  const finalRes = lint(current, options);
  return { fixed: current, diagnostics: finalRes.diagnostics };
}
