import { insertBeforeOffset } from '../core/edits.js';
import { isSignableDefinition, isSignatureBlock } from '../core/patterns.js';
import { collapse, linesBetween, preservedText, wholeLineStart } from '../core/rangeEditor.js';
import { nextSibling } from '../core/siblings.js';
import type { SyntaxNode } from '../core/tree.js';
import type { Edit, Offense } from '../core/types.js';
import type { Rule, RuleContext } from './rule.js';

export const EMPTY_LINE_MESSAGE = 'Extra empty line or comment detected';

// Comments between a sig and its method move above the sig; blank lines go.
export const emptyLineAfterSig: Rule = {
  name: 'empty-line-after-sig',
  code: 'SIG-EMPTY-LINE',
  kinds: ['block'],

  check(node: SyntaxNode, ctx: RuleContext): Offense[] {
    const { tree, buffer } = ctx;
    if (!isSignatureBlock(tree, node)) return [];
    const definition = nextSibling(tree, node);
    if (!definition || !isSignableDefinition(definition)) return [];

    const removal = collapse(buffer, node, definition);
    if (!removal) return [];

    const range = linesBetween(buffer, node, definition);
    const kept = preservedText(buffer, range);
    const corrections: Edit[] = [];
    if (kept !== '') corrections.push(insertBeforeOffset(wholeLineStart(buffer, node), kept));
    corrections.push(removal);

    return [
      {
        rule: 'empty-line-after-sig',
        code: 'SIG-EMPTY-LINE',
        node,
        range,
        message: EMPTY_LINE_MESSAGE,
        corrections,
      },
    ];
  },
};
