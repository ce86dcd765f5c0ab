import { isSignableDefinition, isSignatureBlock } from '../core/patterns.js';
import { hasCapability, methodLabel, nodeToDecorate, planCorrections } from '../core/planner.js';
import { enclosingScope, previousSibling } from '../core/siblings.js';
import type { SyntaxNode } from '../core/tree.js';
import type { Offense } from '../core/types.js';
import type { Rule, RuleContext } from './rule.js';

export const DOCS_URL = 'https://sorbet.org/docs/sigs';
export const DEFAULT_FILE_PATH = '<file path>';

const RULE_NAME = 'methods-should-have-signatures';

export function missingSignatureMessage(label: string, displayPath: string): string {
  return (
    `Methods should have Sorbet signatures. Please add a \`sig\` to method #${label}. ` +
    `You can use \`rbsig --fix --only ${RULE_NAME} ${displayPath}\` to get a starting signature you can modify. ` +
    `See ${DOCS_URL} for more information.`
  );
}

/**
 * A definition needs a signature once the file opts in with `# typed: true`
 * or its scope already extends `T::Sig`. Strict files are left to Sorbet.
 */
export const methodsShouldHaveSignatures: Rule = {
  name: RULE_NAME,
  code: 'SIG-MISSING',
  kinds: ['def', 'defs', 'send'],

  check(node: SyntaxNode, ctx: RuleContext): Offense[] {
    if (ctx.modes.strict || !isSignableDefinition(node)) return [];

    const { tree } = ctx;
    const scope = enclosingScope(tree, node);
    const declared = scope !== undefined && hasCapability(tree, scope);
    if (!declared && !ctx.modes.signaturesEnabled) return [];

    const target = nodeToDecorate(tree, node);
    if (isSignatureBlock(tree, previousSibling(tree, target))) return [];

    return [
      {
        rule: RULE_NAME,
        code: 'SIG-MISSING',
        node,
        range: { begin: node.begin, end: node.end },
        message: missingSignatureMessage(methodLabel(tree, node), ctx.displayPath),
        corrections: planCorrections(tree, node, {
          budget: ctx.options.lineLengthLimit,
          declareCapability: !declared,
        }),
      },
    ];
  },
};
