/**
 * @fileoverview Rules Command
 *
 * Lists the registered rules, optionally for one category.
 *
 * Usage:
 *   convention-lint rules [--category angular|ngrx|rxjs] [--json]
 */

import { createDefaultRegistry, isRuleCategory } from '../../rules/registry.js';
import { RULE_CATEGORIES } from '../../rules/types.js';
import { createError } from '../errors.js';
import { GLOBAL_OPTIONS, parseCommandArgs, type CommandOptions } from './common.js';

export async function rulesCommand(options: CommandOptions): Promise<number> {
  const { values } = parseCommandArgs({
    args: options.rawArgs.slice(1),
    options: {
      ...GLOBAL_OPTIONS,
      category: { type: 'string' },
      json: { type: 'boolean' },
    },
    allowPositionals: true,
  });

  const category = values.category;
  if (category !== undefined && !isRuleCategory(category)) {
    throw createError('EINVALID_ARGUMENT', `Unknown category "${category}". Expected one of: ${RULE_CATEGORIES.join(', ')}`);
  }

  const rules = createDefaultRegistry().list({ category });

  if (values.json) {
    const summary = rules.map((rule) => ({
      id: rule.id,
      category: rule.category,
      name: rule.name,
      defaultSeverity: rule.defaultSeverity,
      description: rule.description,
    }));
    console.log(JSON.stringify(summary, null, 2));
    return 0;
  }

  const idWidth = Math.max(...rules.map((rule) => rule.id.length), 0);
  for (const rule of rules) {
    console.log(`${rule.id.padEnd(idWidth)}  ${rule.defaultSeverity.padEnd(7)}  ${rule.description}`);
  }
  return 0;
}
