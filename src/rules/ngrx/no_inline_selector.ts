import { z } from 'zod';
import { Node, SyntaxKind } from 'ts-morph';
import { defineRule, type RuleFinding } from '../types.js';
import { isFunctionLike, isStoreReceiver } from '../ast_helpers.js';

export const noInlineSelectorRule = defineRule({
  id: 'ngrx/no-inline-selector',
  category: 'ngrx',
  name: 'Select with named selectors',
  description: 'State is read through selectors built with createSelector, not inline projector functions.',
  rationale:
    'Named selectors are memoized, reusable and testable on their own; an inline projector recomputes on every state change and scatters knowledge of the state shape across components.',
  avoid: `this.heroes$ = this.store.select((state) => state.heroes.list);`,
  prefer: `export const selectHeroes = createSelector(selectHeroState, (state) => state.list);

this.heroes$ = this.store.select(selectHeroes);`,
  defaultSeverity: 'warning',
  optionsSchema: z.object({}).strict().default({}),
  check(ctx) {
    const findings: RuleFinding[] = [];

    for (const call of ctx.sourceFile.getDescendantsOfKind(SyntaxKind.CallExpression)) {
      const callee = call.getExpression();
      const isStoreSelect =
        Node.isPropertyAccessExpression(callee) &&
        callee.getName() === 'select' &&
        isStoreReceiver(callee.getExpression());
      const isSelectOperator = Node.isIdentifier(callee) && callee.getText() === 'select';
      if (!isStoreSelect && !isSelectOperator) continue;

      const projector = call.getArguments()[0];
      if (!projector || !isFunctionLike(projector)) continue;
      findings.push({
        node: projector,
        message: 'Inline selector projector passed to select()',
        suggestion: 'Define the projection with createSelector and pass the selector',
      });
    }

    return findings;
  },
});
