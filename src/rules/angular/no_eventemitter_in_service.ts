import { z } from 'zod';
import { SyntaxKind } from 'ts-morph';
import { defineRule, type RuleFinding } from '../types.js';
import { getClassName, hasDecorator } from '../ast_helpers.js';

export const noEventEmitterInServiceRule = defineRule({
  id: 'angular/no-eventemitter-in-service',
  category: 'angular',
  name: 'No EventEmitter in services',
  description: 'Services publish state and events through RxJS subjects, not EventEmitter.',
  rationale:
    'EventEmitter exists to back @Output bindings; its API is not guaranteed to stay an Observable, and using it in a service hides the difference between a component event and shared state.',
  avoid: `@Injectable({ providedIn: 'root' })
export class CartService {
  readonly changed = new EventEmitter<Cart>();
}`,
  prefer: `@Injectable({ providedIn: 'root' })
export class CartService {
  private readonly changedSubject = new Subject<Cart>();
  readonly changed$ = this.changedSubject.asObservable();
}`,
  defaultSeverity: 'warning',
  optionsSchema: z.object({}).strict().default({}),
  check(ctx) {
    const findings: RuleFinding[] = [];

    for (const cls of ctx.sourceFile.getDescendantsOfKind(SyntaxKind.ClassDeclaration)) {
      if (!hasDecorator(cls, ['Injectable'])) continue;
      for (const construction of cls.getDescendantsOfKind(SyntaxKind.NewExpression)) {
        if (construction.getExpression().getText() !== 'EventEmitter') continue;
        findings.push({
          node: construction,
          message: `EventEmitter used in service "${getClassName(cls)}"`,
          suggestion: 'Use a private Subject and expose it with asObservable()',
        });
      }
    }

    return findings;
  },
});
