import { z } from 'zod';
import { Node, SyntaxKind } from 'ts-morph';
import { defineRule, type RuleFinding } from '../types.js';
import { getStringLiteralValue, isCallNamed } from '../ast_helpers.js';

const ON_PREFIX = /^on[A-Z]/;

function stripOnPrefix(name: string): string {
  const rest = name.slice(2);
  return rest.charAt(0).toLowerCase() + rest.slice(1);
}

export const noOutputOnPrefixRule = defineRule({
  id: 'angular/no-output-on-prefix',
  category: 'angular',
  name: 'Outputs without the "on" prefix',
  description: 'Outputs are named after the event, not prefixed with "on".',
  rationale:
    'Angular binds events as (save), matching native events such as (click); the "on" prefix belongs to the handler method, not to the event.',
  avoid: `export class HeroFormComponent {
  @Output() onSave = new EventEmitter<Hero>();
}`,
  prefer: `export class HeroFormComponent {
  @Output() save = new EventEmitter<Hero>();
}`,
  defaultSeverity: 'warning',
  optionsSchema: z.object({}).strict().default({}),
  check(ctx) {
    const findings: RuleFinding[] = [];

    for (const prop of ctx.sourceFile.getDescendantsOfKind(SyntaxKind.PropertyDeclaration)) {
      const decorator = prop.getDecorator('Output');
      const initializer = prop.getInitializer();
      const isSignalOutput = initializer !== undefined && isCallNamed(initializer, ['output']);
      if (!decorator && !isSignalOutput) continue;

      const name = prop.getName();
      if (ON_PREFIX.test(name)) {
        findings.push({
          node: prop.getNameNode(),
          message: `Output "${name}" should not be prefixed with "on"`,
          suggestion: `Rename to "${stripOnPrefix(name)}"`,
        });
      }

      const aliasNode = decorator?.getArguments()[0];
      const alias = getStringLiteralValue(aliasNode);
      if (alias !== undefined && aliasNode && ON_PREFIX.test(alias)) {
        findings.push({
          node: aliasNode,
          message: `Output alias "${alias}" should not be prefixed with "on"`,
          suggestion: `Rename the alias to "${stripOnPrefix(alias)}"`,
        });
      }

      if (isSignalOutput && Node.isCallExpression(initializer)) {
        const options = initializer.getArguments()[0];
        if (options && Node.isObjectLiteralExpression(options)) {
          const aliasProperty = options.getProperty('alias');
          if (aliasProperty && Node.isPropertyAssignment(aliasProperty)) {
            const signalAliasNode = aliasProperty.getInitializer();
            const signalAlias = getStringLiteralValue(signalAliasNode);
            if (signalAlias !== undefined && signalAliasNode && ON_PREFIX.test(signalAlias)) {
              findings.push({
                node: signalAliasNode,
                message: `Output alias "${signalAlias}" should not be prefixed with "on"`,
                suggestion: `Rename the alias to "${stripOnPrefix(signalAlias)}"`,
              });
            }
          }
        }
      }
    }

    return findings;
  },
});
