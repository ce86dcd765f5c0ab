import type { Offense } from '../core/types.js';
import { emptyLineAfterSig } from './empty-line-after-sig.js';
import { methodsShouldHaveSignatures } from './methods-should-have-signatures.js';
import type { Rule, RuleContext } from './rule.js';

export type { Rule, RuleContext, RuleOptions } from './rule.js';

export const ALL_RULES: readonly Rule[] = [methodsShouldHaveSignatures, emptyLineAfterSig];

/** Walk the tree in document order and dispatch each node to the rules registered for its kind. */
export function runRules(rules: readonly Rule[], ctx: RuleContext): Offense[] {
  const offenses: Offense[] = [];
  for (const node of ctx.tree.walk()) {
    for (const rule of rules) {
      if (rule.kinds.includes(node.kind)) offenses.push(...rule.check(node, ctx));
    }
  }
  return offenses;
}
