import { z } from 'zod';
import { Node, SyntaxKind } from 'ts-morph';
import { defineRule, type RuleFinding } from '../types.js';
import { getMethodReceiver, isCallNamed } from '../ast_helpers.js';

export const noDispatchInEffectsRule = defineRule({
  id: 'ngrx/no-dispatch-in-effects',
  category: 'ngrx',
  name: 'Effects return actions',
  description: 'Effects map to the actions they produce instead of calling store.dispatch().',
  rationale:
    'An effect that dispatches by hand hides its output from the effect signature, cannot be tested by asserting on the emitted actions, and easily dispatches twice or out of order.',
  avoid: `loadHeroes$ = createEffect(
  () =>
    this.actions$.pipe(
      ofType(heroListOpened),
      tap(() => this.store.dispatch(heroesRequested())),
    ),
  { dispatch: false },
);`,
  prefer: `loadHeroes$ = createEffect(() =>
  this.actions$.pipe(
    ofType(heroListOpened),
    map(() => heroesRequested()),
  ),
);`,
  defaultSeverity: 'error',
  optionsSchema: z.object({}).strict().default({}),
  check(ctx) {
    const findings: RuleFinding[] = [];

    for (const effect of ctx.sourceFile.getDescendantsOfKind(SyntaxKind.CallExpression)) {
      if (!isCallNamed(effect, ['createEffect'])) continue;
      const source = effect.getArguments()[0];
      if (!source) continue;
      for (const call of source.getDescendantsOfKind(SyntaxKind.CallExpression)) {
        if (!getMethodReceiver(call, 'dispatch')) continue;
        const callee = call.getExpression();
        findings.push({
          node: Node.isPropertyAccessExpression(callee) ? callee.getNameNode() : call,
          message: 'dispatch() called inside an effect',
          suggestion: 'Map to the action and let the effect emit it',
        });
      }
    }

    return findings;
  },
});
