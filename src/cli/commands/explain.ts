/**
 * @fileoverview Explain Command
 *
 * Prints one rule the way the style guide presents it.
 *
 * Usage:
 *   convention-lint explain <rule-id>
 */

import { createDefaultRegistry } from '../../rules/registry.js';
import type { AnyRuleDefinition } from '../../rules/types.js';
import { createError } from '../errors.js';
import { GLOBAL_OPTIONS, parseCommandArgs, type CommandOptions } from './common.js';

function indent(text: string): string {
  return text
    .split('\n')
    .map((line) => (line ? `    ${line}` : line))
    .join('\n');
}

export function formatRuleExplanation(rule: AnyRuleDefinition): string {
  return [
    `${rule.id} (default: ${rule.defaultSeverity})`,
    rule.name,
    '',
    rule.description,
    '',
    'Why?',
    indent(rule.rationale),
    '',
    'Avoid:',
    indent(rule.avoid),
    '',
    'Do:',
    indent(rule.prefer),
  ].join('\n');
}

export async function explainCommand(options: CommandOptions): Promise<number> {
  const { positionals } = parseCommandArgs({
    args: options.rawArgs.slice(1),
    options: { ...GLOBAL_OPTIONS },
    allowPositionals: true,
  });

  const ruleId = positionals[0];
  if (!ruleId) {
    throw createError('EINVALID_ARGUMENT', 'A rule id is required. Usage: convention-lint explain <rule-id>');
  }

  console.log(formatRuleExplanation(createDefaultRegistry().require(ruleId)));
  return 0;
}
