import type { Diagnostic } from './types.js';

export type OutputFormat = 'text' | 'json';

export function groupDiagnostics(diagnostics: Diagnostic[]) {
  const errs = diagnostics.filter(d => d.severity === 'error');
  const warns = diagnostics.filter(d => d.severity === 'warning');
  return { errs, warns };
}

export function textReport(filename: string, content: string, diagnostics: Diagnostic[]): string {
  const { errs, warns } = groupDiagnostics(diagnostics);
  const lines: string[] = [];
  const allLines = content.split(/\r?\n/);
  const numWidth = String(allLines.length).length;
  const fmtNum = (n: number) => String(n).padStart(numWidth, ' ');

  const printBlock = (kind: 'error' | 'warning', d: Diagnostic) => {
    const kindColor = kind === 'error' ? '\x1b[31merror\x1b[0m' : '\x1b[33mwarning\x1b[0m';
    const code = d.code ? `[${d.code}]` : '';
    lines.push(`${kindColor}${code}: ${d.message}`);
    lines.push(`at ${filename}:${d.line}:${d.column}`);
    const idx = Math.max(0, Math.min(allLines.length - 1, d.line - 1));
    const prev = idx > 0 ? allLines[idx - 1] : undefined;
    const text = allLines[idx] ?? '';
    const next = idx + 1 < allLines.length ? allLines[idx + 1] : undefined;

    if (typeof prev === 'string') lines.push(`  ${fmtNum(idx)} | ${prev}`);
    lines.push(`  ${fmtNum(idx + 1)} | ${text}`);
    const caretPad = ' '.repeat(Math.max(0, d.column - 1));
    const caretLen = Math.max(1, d.length ?? 1);
    lines.push(`  ${' '.repeat(numWidth)} | ${caretPad}\x1b[31m${'^'.repeat(caretLen)}\x1b[0m`);
    if (typeof next === 'string') lines.push(`  ${fmtNum(idx + 2)} | ${next}`);
    if (d.hint) {
      const hintLines = String(d.hint).split(/\r?\n/);
      lines.push(`hint: ${hintLines[0]}`);
      for (let i = 1; i < hintLines.length; i++) {
        lines.push(`  ${hintLines[i]}`);
      }
    }
    lines.push('');
  };

  for (const e of errs) printBlock('error', e);
  for (const w of warns) printBlock('warning', w);
  if (errs.length === 0 && warns.length === 0) return 'No offenses';
  return lines.join('\n');
}

export function toJsonResult(filename: string, diagnostics: Diagnostic[]) {
  const { errs, warns } = groupDiagnostics(diagnostics);
  return {
    file: filename,
    valid: errs.length === 0 && warns.length === 0,
    errorCount: errs.length,
    warningCount: warns.length,
    errors: errs,
    warnings: warns,
  };
}
