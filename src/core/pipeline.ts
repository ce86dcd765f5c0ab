import * as fs from 'node:fs';
import { ALL_RULES, runRules, type Rule } from '../rules/index.js';
import { DEFAULT_FILE_PATH } from '../rules/methods-should-have-signatures.js';
import { parseRuby } from '../ruby/index.js';
import type { TextBuffer } from './buffer.js';
import { defaultConfig, type RbsigConfig } from './config.js';
import { warningAt } from './errorBuilder.js';
import { detectFileModes } from './modes.js';
import type { SyntaxTree } from './tree.js';
import type { Diagnostic, FileModes, LineBudget, Offense, RuleName } from './types.js';

export interface LintOptions {
  /** Shown in messages when the file exists on disk. */
  filename?: string;
  config?: RbsigConfig;
  /** Restrict the run to these rules. */
  only?: readonly RuleName[];
  /** Overrides the configured line length limit. */
  lineLengthLimit?: LineBudget;
}

export interface LintResult {
  buffer: TextBuffer;
  offenses: Offense[];
  /** Syntax errors, or one warning per offense. */
  diagnostics: Diagnostic[];
  tree?: SyntaxTree;
  modes?: FileModes;
}

export function displayPathFor(filename: string | undefined): string {
  return filename && fs.existsSync(filename) ? filename : DEFAULT_FILE_PATH;
}

export function enabledRules(config: RbsigConfig, only?: readonly RuleName[]): Rule[] {
  return ALL_RULES.filter((rule) => config.rules[rule.name].enabled && (!only || only.includes(rule.name)));
}

export function offenseDiagnostic(buffer: TextBuffer, offense: Offense): Diagnostic {
  const { line, column } = buffer.position(offense.range.begin);
  const lineEnd = buffer.lineStartOf(offense.range.begin) + buffer.lineText(line).length;
  const length = Math.max(1, Math.min(offense.range.end, lineEnd) - offense.range.begin);
  return warningAt(line, column, offense.message, { code: offense.code, rule: offense.rule, length });
}

export function lintRuby(text: string, options: LintOptions = {}): LintResult {
  const parsed = parseRuby(text);
  const { buffer, tree } = parsed;
  // Syntax errors stop analysis
  if (!tree) return { buffer, offenses: [], diagnostics: parsed.diagnostics };

  const modes = detectFileModes(parsed.comments, parsed.tokens);
  const config = options.config ?? defaultConfig();
  const configuredLimit = config.rules['methods-should-have-signatures'].lineLengthLimit;
  const offenses = runRules(enabledRules(config, options.only), {
    tree,
    buffer,
    modes,
    options: { lineLengthLimit: options.lineLengthLimit !== undefined ? options.lineLengthLimit : configuredLimit },
    displayPath: displayPathFor(options.filename),
  });
  const diagnostics = offenses.map((o) => offenseDiagnostic(buffer, o));
  return { buffer, offenses, diagnostics, tree, modes };
}
