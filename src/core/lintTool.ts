import { z } from 'zod';
import { EditConflictError } from './edits.js';
import { lintRuby } from './pipeline.js';
import type { Diagnostic, RuleName } from './types.js';
import { fixRuby } from '../index.js';

// Input schemas using Zod
export const LintRubySignaturesSchema = z.object({
  text: z.string().describe('Ruby source text to check'),
  autofix: z.boolean().optional().describe('If true, apply corrections and return the corrected source'),
  lineLengthLimit: z.number().int().positive().nullable().optional()
    .describe('Maximum width of a one-line signature; null for no limit'),
  only: z.array(z.enum(['methods-should-have-signatures', 'empty-line-after-sig'])).optional()
    .describe('Restrict the check to these rules'),
});

export type LintRubySignaturesInput = z.infer<typeof LintRubySignaturesSchema>;

function countBySeverity(diagnostics: Diagnostic[]) {
  return {
    errorCount: diagnostics.filter((d) => d.severity === 'error').length,
    warningCount: diagnostics.filter((d) => d.severity === 'warning').length,
  };
}

/**
 * Tool body; returns the JSON payload sent back to the client.
 */
export function runLintTool(input: LintRubySignaturesInput) {
  const only: RuleName[] | undefined = input.only;
  const options = { only, lineLengthLimit: input.lineLengthLimit };

  if (input.autofix) {
    try {
      const { fixed, diagnostics } = fixRuby(input.text, options);
      return { fixed, valid: diagnostics.length === 0, ...countBySeverity(diagnostics), diagnostics };
    } catch (e) {
      if (!(e instanceof EditConflictError)) throw e;
      return { valid: false, errorCount: 1, warningCount: 0, diagnostics: [], conflict: e.message };
    }
  }

  const { diagnostics } = lintRuby(input.text, options);
  return { valid: diagnostics.length === 0, ...countBySeverity(diagnostics), diagnostics };
}
