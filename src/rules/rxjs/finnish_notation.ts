import { z } from 'zod';
import { Node, SyntaxKind, type TypeNode } from 'ts-morph';
import { defineRule, type RuleFinding } from '../types.js';
import { isObservableInitializer, isObservableTypeText } from '../ast_helpers.js';

function holdsObservable(typeNode: TypeNode | undefined, initializer: Node | undefined): boolean {
  if (typeNode) return isObservableTypeText(typeNode.getText());
  return isObservableInitializer(initializer);
}

export const finnishNotationRule = defineRule({
  id: 'rxjs/finnish-notation',
  category: 'rxjs',
  name: 'Finnish notation for observables',
  description: 'Variables, properties and parameters that hold an Observable end with "$".',
  rationale:
    'The suffix tells the reader that the value is a stream to subscribe to rather than the value itself, and pairs naturally with the plain name of the emitted value.',
  avoid: `export class HeroListComponent {
  readonly heroes: Observable<Hero[]> = this.store.select(selectHeroes);
}`,
  prefer: `export class HeroListComponent {
  readonly heroes$: Observable<Hero[]> = this.store.select(selectHeroes);
}`,
  defaultSeverity: 'warning',
  optionsSchema: z.object({}).strict().default({}),
  check(ctx) {
    const findings: RuleFinding[] = [];
    const report = (nameNode: Node, kind: string): void => {
      if (!Node.isIdentifier(nameNode)) return;
      const name = nameNode.getText();
      if (name.endsWith('$')) return;
      findings.push({
        node: nameNode,
        message: `Observable ${kind} "${name}" should end with "$"`,
        suggestion: `Rename to "${name}$"`,
      });
    };

    for (const declaration of ctx.sourceFile.getDescendantsOfKind(SyntaxKind.VariableDeclaration)) {
      if (holdsObservable(declaration.getTypeNode(), declaration.getInitializer())) {
        report(declaration.getNameNode(), 'variable');
      }
    }

    for (const prop of ctx.sourceFile.getDescendantsOfKind(SyntaxKind.PropertyDeclaration)) {
      if (holdsObservable(prop.getTypeNode(), prop.getInitializer())) {
        report(prop.getNameNode(), 'property');
      }
    }

    for (const param of ctx.sourceFile.getDescendantsOfKind(SyntaxKind.Parameter)) {
      const typeNode = param.getTypeNode();
      if (typeNode && isObservableTypeText(typeNode.getText())) {
        report(param.getNameNode(), 'parameter');
      }
    }

    return findings;
  },
});
