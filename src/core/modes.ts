import type { IToken } from 'chevrotain';
import type { FileModes } from './types.js';

const TYPED_TRUE_RE = /^#\s*typed:\s*true\s*$/;
const TYPED_STRICT_RE = /^#\s*typed:\s*(?:strict|strong)\s*$/;

/** Comments that come before the first code token. */
export function leadingComments(comments: readonly IToken[], tokens: readonly IToken[]): IToken[] {
  const firstCode = tokens.find((tok) => tok.tokenType.name !== 'Newline');
  if (!firstCode) return [...comments];
  return comments.filter((c) => c.startOffset < firstCode.startOffset);
}

export function detectFileModes(comments: readonly IToken[], tokens: readonly IToken[]): FileModes {
  const leading = leadingComments(comments, tokens).map((c) => c.image.trimEnd());
  const strict = leading.some((text) => TYPED_STRICT_RE.test(text));
  return {
    strict,
    signaturesEnabled: !strict && leading.some((text) => TYPED_TRUE_RE.test(text)),
  };
}
