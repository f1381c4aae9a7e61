import { z } from 'zod';
import { Node, SyntaxKind } from 'ts-morph';
import { defineRule, type RuleFinding } from '../types.js';
import { getCalleeName, getMethodReceiver, isCallNamed } from '../ast_helpers.js';

/** Operators that cannot re-subscribe to the source once takeUntil has completed it */
const DEFAULT_ALLOW_AFTER = [
  'count',
  'defaultIfEmpty',
  'endWith',
  'finalize',
  'last',
  'reduce',
  'share',
  'shareReplay',
  'takeLast',
  'throwIfEmpty',
  'toArray',
];

const optionsSchema = z
  .object({
    allowAfter: z.array(z.string().min(1)).default(DEFAULT_ALLOW_AFTER),
  })
  .strict()
  .default({});

export const takeUntilLastRule = defineRule({
  id: 'rxjs/takeuntil-last',
  category: 'rxjs',
  name: 'takeUntil comes last',
  description: 'takeUntil is the last operator in a pipe, after every operator that can subscribe to another stream.',
  rationale:
    'Operators placed after takeUntil, such as switchMap, open inner subscriptions that the notifier never reaches, so the leak that takeUntil was meant to prevent remains.',
  avoid: `this.query$
  .pipe(takeUntil(this.destroy$), switchMap((query) => this.search(query)))
  .subscribe();`,
  prefer: `this.query$
  .pipe(switchMap((query) => this.search(query)), takeUntil(this.destroy$))
  .subscribe();`,
  defaultSeverity: 'warning',
  optionsSchema,
  check(ctx) {
    const allowAfter = ctx.options.allowAfter;
    const findings: RuleFinding[] = [];

    for (const call of ctx.sourceFile.getDescendantsOfKind(SyntaxKind.CallExpression)) {
      if (!getMethodReceiver(call, 'pipe')) continue;
      const operators = call.getArguments();
      const index = operators.findIndex((arg) => isCallNamed(arg, ['takeUntil']));
      if (index === -1) continue;

      const offending = operators.slice(index + 1).find((arg) => !isCallNamed(arg, allowAfter));
      if (!offending) continue;

      const offendingName = Node.isCallExpression(offending)
        ? getCalleeName(offending) ?? offending.getText()
        : offending.getText();
      findings.push({
        node: operators[index],
        message: `takeUntil should be the last operator in pipe(); "${offendingName}" follows it`,
        suggestion: 'Move takeUntil to the end of the pipe',
      });
    }

    return findings;
  },
});
