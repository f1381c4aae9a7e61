import { z } from 'zod';
import { Node, SyntaxKind } from 'ts-morph';
import { defineRule, type RuleFinding } from '../types.js';
import { isSubscribeCall, isWithinArguments } from '../ast_helpers.js';

export const noNestedSubscribeRule = defineRule({
  id: 'rxjs/no-nested-subscribe',
  category: 'rxjs',
  name: 'No nested subscriptions',
  description: 'An inner stream is composed into the outer one with a flattening operator, never subscribed inside a subscribe callback.',
  rationale:
    'Inner subscriptions escape the outer subscription: they are not cancelled when the outer stream emits again or completes, and their errors bypass the outer error handler.',
  avoid: `this.route.paramMap.subscribe((params) => {
  this.heroService.getHero(params.get('id')).subscribe((hero) => (this.hero = hero));
});`,
  prefer: `this.route.paramMap
  .pipe(switchMap((params) => this.heroService.getHero(params.get('id'))))
  .subscribe((hero) => (this.hero = hero));`,
  defaultSeverity: 'error',
  optionsSchema: z.object({}).strict().default({}),
  check(ctx) {
    const findings: RuleFinding[] = [];

    for (const call of ctx.sourceFile.getDescendantsOfKind(SyntaxKind.CallExpression)) {
      if (!isSubscribeCall(call)) continue;
      const outer = call.getFirstAncestor((ancestor) => isSubscribeCall(ancestor) && isWithinArguments(ancestor, call));
      if (!outer) continue;
      const callee = call.getExpression();
      findings.push({
        node: Node.isPropertyAccessExpression(callee) ? callee.getNameNode() : call,
        message: 'subscribe() called inside another subscribe() callback',
        suggestion: 'Flatten the inner stream with switchMap, mergeMap, concatMap or exhaustMap',
      });
    }

    return findings;
  },
});
