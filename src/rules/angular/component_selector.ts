import { z } from 'zod';
import { Node, SyntaxKind } from 'ts-morph';
import { defineRule, type RuleFinding } from '../types.js';
import { getStringLiteralValue } from '../ast_helpers.js';

const KEBAB_CASE = /^[a-z][a-z0-9]*(-[a-z0-9]+)*$/;

const optionsSchema = z
  .object({
    prefix: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]).default('app'),
  })
  .strict()
  .default({});

/**
 * Attribute (`[appFoo]`), class (`.foo`) and pseudo selectors are left to the
 * directive conventions; only element selectors are checked.
 */
function isElementSelector(selector: string): boolean {
  return /^[A-Za-z]/.test(selector) && !/[[.:#]/.test(selector);
}

export const componentSelectorRule = defineRule({
  id: 'angular/component-selector',
  category: 'angular',
  name: 'Prefixed kebab-case component selectors',
  description: 'Component element selectors are kebab-case and start with the project prefix.',
  rationale:
    'A shared prefix keeps components apart from native elements and from third-party libraries, and kebab-case matches the custom element specification.',
  avoid: `@Component({ selector: 'heroList', template: '' })
export class HeroListComponent {}`,
  prefer: `@Component({ selector: 'app-hero-list', template: '' })
export class HeroListComponent {}`,
  defaultSeverity: 'error',
  optionsSchema,
  check(ctx) {
    const prefixes = Array.isArray(ctx.options.prefix) ? ctx.options.prefix : [ctx.options.prefix];
    const findings: RuleFinding[] = [];

    for (const cls of ctx.sourceFile.getDescendantsOfKind(SyntaxKind.ClassDeclaration)) {
      const decorator = cls.getDecorator('Component');
      const metadata = decorator?.getArguments()[0];
      if (!metadata || !Node.isObjectLiteralExpression(metadata)) continue;
      const property = metadata.getProperty('selector');
      if (!property || !Node.isPropertyAssignment(property)) continue;
      const initializer = property.getInitializer();
      const value = getStringLiteralValue(initializer);
      if (value === undefined || !initializer) continue;

      for (const selector of value.split(',').map((part) => part.trim())) {
        if (!isElementSelector(selector)) continue;
        if (!KEBAB_CASE.test(selector)) {
          findings.push({
            node: initializer,
            message: `Component selector "${selector}" should be kebab-case`,
            suggestion: `Use a selector such as "${prefixes[0]}-${toKebabCase(selector)}"`,
          });
          continue;
        }
        if (!prefixes.some((prefix) => selector.startsWith(`${prefix}-`))) {
          const expected = prefixes.map((prefix) => `"${prefix}-"`).join(', ');
          findings.push({
            node: initializer,
            message:
              prefixes.length === 1
                ? `Component selector "${selector}" should start with ${expected}`
                : `Component selector "${selector}" should start with one of ${expected}`,
          });
        }
      }
    }

    return findings;
  },
});

function toKebabCase(value: string): string {
  return value
    .replace(/([a-z0-9])([A-Z])/g, '$1-$2')
    .replace(/[_\s]+/g, '-')
    .toLowerCase();
}
