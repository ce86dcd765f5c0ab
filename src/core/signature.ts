import type { ArgumentDescriptor, IndentationContext, LineBudget } from './types.js';

export const PLACEHOLDER_TYPE = 'T.untyped';
export const ONE_INDENT_LEVEL = '  ';

const RETURN_CLAUSE = `returns(${PLACEHOLDER_TYPE})`;

function parameterEntries(args: readonly ArgumentDescriptor[]): string[] {
  return args.map((arg) => `${arg.name}: ${PLACEHOLDER_TYPE}`);
}

export function singleLineSignature(args: readonly ArgumentDescriptor[]): string {
  const entries = parameterEntries(args);
  const params = entries.length > 0 ? `params(${entries.join(', ')}).` : '';
  return `sig { ${params}${RETURN_CLAUSE} }`;
}

/** Block form; every line after the first starts at `indentation`. */
export function multiLineSignature(args: readonly ArgumentDescriptor[], indentation: string): string {
  const entries = parameterEntries(args);
  const inner = indentation + ONE_INDENT_LEVEL;
  let clause = RETURN_CLAUSE;
  if (entries.length > 0) {
    const argIndent = inner + ONE_INDENT_LEVEL;
    clause = `params(\n${argIndent}${entries.join(`,\n${argIndent}`)}\n${inner}).${RETURN_CLAUSE}`;
  }
  return `sig do\n${inner}${clause}\n${indentation}end`;
}

/**
 * Signature text for a method with the given arguments. The one-line form is
 * used unless it would overflow `budget` once indented.
 */
export function synthesizeSignature(
  args: readonly ArgumentDescriptor[],
  budget: LineBudget,
  indentation: IndentationContext,
): string {
  const oneLine = singleLineSignature(args);
  if (budget === null || indentation.column + oneLine.length <= budget) return oneLine;
  return multiLineSignature(args, indentation.text);
}
