import { z } from 'zod';
import { SyntaxKind } from 'ts-morph';
import { defineRule, type RuleFinding } from '../types.js';
import { getStringLiteralValue, isCallNamed } from '../ast_helpers.js';

/** `[Source] Event`, e.g. `[Hero List Page] Opened` */
export const ACTION_TYPE_FORMAT = /^\[[^\]]+\] \S.*$/;

export const actionTypeFormatRule = defineRule({
  id: 'ngrx/action-type-format',
  category: 'ngrx',
  name: 'Action types name their source',
  description: 'Action type strings follow the "[Source] Event" format.',
  rationale:
    'The bracketed source says where an action was dispatched from, which keeps actions unique per source and makes the action log in the devtools readable as a story of events.',
  avoid: `export const loadHeroes = createAction('loadHeroes');`,
  prefer: `export const heroListOpened = createAction('[Hero List Page] Opened');`,
  defaultSeverity: 'error',
  optionsSchema: z.object({}).strict().default({}),
  check(ctx) {
    const findings: RuleFinding[] = [];

    for (const call of ctx.sourceFile.getDescendantsOfKind(SyntaxKind.CallExpression)) {
      if (!isCallNamed(call, ['createAction'])) continue;
      const typeNode = call.getArguments()[0];
      const type = getStringLiteralValue(typeNode);
      if (type === undefined || !typeNode || ACTION_TYPE_FORMAT.test(type)) continue;
      findings.push({
        node: typeNode,
        message: `Action type "${type}" should follow the "[Source] Event" format`,
        suggestion: 'Prefix the type with the bracketed source, e.g. "[Hero List Page] Opened"',
      });
    }

    return findings;
  },
});
