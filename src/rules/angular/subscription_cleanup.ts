import { z } from 'zod';
import { Node, SyntaxKind } from 'ts-morph';
import { defineRule, type RuleFinding } from '../types.js';
import { getClassName, getMethodReceiver, hasDecorator, isCallNamed } from '../ast_helpers.js';

const DEFAULT_COMPLETING_OPERATORS = ['takeUntil', 'takeUntilDestroyed', 'take', 'first'];

const optionsSchema = z
  .object({
    completingOperators: z.array(z.string().min(1)).default(DEFAULT_COMPLETING_OPERATORS),
  })
  .strict()
  .default({});

export const subscriptionCleanupRule = defineRule({
  id: 'angular/subscription-cleanup',
  category: 'angular',
  name: 'Clean up component subscriptions',
  description:
    'Subscriptions made by components and directives complete with the view: through a completing operator in the pipe, or by unsubscribing in ngOnDestroy.',
  rationale:
    'A subscription outlives the component that opened it; every instance leaks its callbacks and keeps running side effects after the view is gone.',
  avoid: `@Component({ selector: 'app-hero-list', template: '' })
export class HeroListComponent implements OnInit {
  ngOnInit() {
    this.heroService.heroes$.subscribe((heroes) => (this.heroes = heroes));
  }
}`,
  prefer: `@Component({ selector: 'app-hero-list', template: '' })
export class HeroListComponent implements OnInit {
  private readonly destroyRef = inject(DestroyRef);

  ngOnInit() {
    this.heroService.heroes$
      .pipe(takeUntilDestroyed(this.destroyRef))
      .subscribe((heroes) => (this.heroes = heroes));
  }
}`,
  defaultSeverity: 'error',
  optionsSchema,
  check(ctx) {
    const completing = ctx.options.completingOperators;
    const findings: RuleFinding[] = [];

    for (const cls of ctx.sourceFile.getDescendantsOfKind(SyntaxKind.ClassDeclaration)) {
      if (!hasDecorator(cls, ['Component', 'Directive'])) continue;
      if (cls.getMethod('ngOnDestroy')) continue;

      for (const call of cls.getDescendantsOfKind(SyntaxKind.CallExpression)) {
        // Nested classes are checked on their own.
        if (call.getFirstAncestorByKind(SyntaxKind.ClassDeclaration) !== cls) continue;
        const receiver = getMethodReceiver(call, 'subscribe');
        if (!receiver) continue;
        const pipeArgs =
          Node.isCallExpression(receiver) && getMethodReceiver(receiver, 'pipe') !== undefined
            ? receiver.getArguments()
            : [];
        if (pipeArgs.some((arg) => isCallNamed(arg, completing))) continue;

        const callee = call.getExpression();
        findings.push({
          node: Node.isPropertyAccessExpression(callee) ? callee.getNameNode() : call,
          message: `Subscription in "${getClassName(cls)}" is never cleaned up`,
          suggestion: 'Pipe through takeUntilDestroyed() or unsubscribe in ngOnDestroy',
        });
      }
    }

    return findings;
  },
});
