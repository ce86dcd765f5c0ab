import type { ILexingError, IRecognitionException, IToken } from 'chevrotain';
import type { Diagnostic } from './types.js';
import { errorAt } from './errorBuilder.js';

export function coercePos(line?: number | null, column?: number | null, fallbackLine = 1, fallbackColumn = 1) {
  const ln = typeof line === 'number' && Number.isFinite(line) && line > 0 ? line : fallbackLine;
  const col = typeof column === 'number' && Number.isFinite(column) && column > 0 ? column : fallbackColumn;
  return { line: ln, column: col };
}

export function endOfTextPos(text: string) {
  const lines = text.split(/\r?\n/);
  const line = lines.length;
  const last = lines[lines.length - 1] ?? '';
  const column = Math.max(1, last.length + 1);
  return { line, column };
}

export function fromLexerError(e: ILexingError): Diagnostic {
  return errorAt(e.line, e.column, e.message, { code: 'RB-LEX', length: Math.max(1, e.length) });
}

// Helpers
function tokenImage(t?: IToken | null) {
  const img = t?.image ?? '';
  return img === '\n' ? '\\n' : img;
}

function expecting(err: IRecognitionException, tokenName: string) {
  // Chevrotain does not expose expected tokens structurally; fall back to message text.
  return (err.message || '').includes(`--> ${tokenName} <--`);
}

// Innermost construct an `end` would close
const OPENERS: Record<string, string> = {
  classDef: 'class',
  moduleDef: 'module',
  methodDef: 'def',
  conditional: 'if',
  caseExpr: 'case',
  beginBlock: 'begin',
  block: 'do',
};

export function mapRubyParserError(err: IRecognitionException, text: string): Diagnostic {
  const tok = err.token;
  const posFallback = endOfTextPos(text);
  const isEof = tok.tokenType.name === 'EOF';
  const { line, column } = isEof
    ? posFallback
    : coercePos(tok.startLine, tok.startColumn, posFallback.line, posFallback.column);
  const found = tokenImage(tok);
  const length = found.length > 0 ? found.length : 1;

  if (isEof && expecting(err, 'End')) {
    const opener = [...err.context.ruleStack].reverse().map((rule) => OPENERS[rule]).find(Boolean) ?? 'block';
    return errorAt(line, column, `Unexpected end of file: missing 'end' to close a '${opener}'.`, {
      code: 'RB-MISSING-END',
      hint: `Add 'end' after the last statement of the '${opener}'.`,
      length: 1,
    });
  }

  if (err.name === 'NotAllInputParsedException' && tok.tokenType.name === 'End') {
    return errorAt(line, column, "Unexpected 'end' with nothing to close.", {
      code: 'RB-UNEXPECTED-END',
      hint: "Remove the extra 'end' or check the block it should close.",
      length,
    });
  }

  const what = isEof ? 'end of file' : `'${found}'`;
  return errorAt(line, column, `Syntax error: unexpected ${what}.`, {
    code: 'RB-PARSE',
    hint: err.message,
    length,
  });
}
