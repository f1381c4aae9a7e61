import { z } from 'zod';
import { SyntaxKind } from 'ts-morph';
import { defineRule, type RuleFinding } from '../types.js';
import { isNonPublicMember, isSubjectConstruction, isSubjectTypeText } from '../ast_helpers.js';

export const noExposedSubjectRule = defineRule({
  id: 'rxjs/no-exposed-subject',
  category: 'rxjs',
  name: 'Keep subjects private',
  description: 'Subjects stay private to the class that owns them; consumers receive asObservable().',
  rationale:
    'A public Subject lets any consumer call next(), error() or complete() on shared state, so the owner can no longer reason about what the stream emits.',
  avoid: `export class HeroStore {
  readonly heroes$ = new BehaviorSubject<Hero[]>([]);
}`,
  prefer: `export class HeroStore {
  private readonly heroesSubject = new BehaviorSubject<Hero[]>([]);
  readonly heroes$ = this.heroesSubject.asObservable();
}`,
  defaultSeverity: 'warning',
  optionsSchema: z.object({}).strict().default({}),
  check(ctx) {
    const findings: RuleFinding[] = [];

    for (const prop of ctx.sourceFile.getDescendantsOfKind(SyntaxKind.PropertyDeclaration)) {
      if (isNonPublicMember(prop)) continue;
      const typeNode = prop.getTypeNode();
      const isSubject = typeNode ? isSubjectTypeText(typeNode.getText()) : isSubjectConstruction(prop.getInitializer());
      if (!isSubject) continue;
      findings.push({
        node: prop.getNameNode(),
        message: `Subject "${prop.getName()}" is publicly exposed`,
        suggestion: 'Make it private and expose asObservable() instead',
      });
    }

    return findings;
  },
});
