/**
 * @fileoverview Rule contracts
 *
 * Every convention the guide documents is one `RuleDefinition`: an id, the
 * guide's Avoid/Do/Why text, a default severity, an options schema and a
 * syntactic check over a parsed source file.
 */

import type { z } from 'zod';
import type { Node, SourceFile } from 'ts-morph';

export type Severity = 'error' | 'warning';

export type RuleLevel = Severity | 'off';

export const RULE_CATEGORIES = ['angular', 'ngrx', 'rxjs'] as const;

export type RuleCategory = (typeof RULE_CATEGORIES)[number];

export interface RuleContext<TOptions> {
  sourceFile: SourceFile;
  /** Workspace-relative POSIX path */
  relPath: string;
  options: TOptions;
}

export interface RuleFinding {
  node: Node;
  message: string;
  suggestion?: string;
}

export interface RuleDefinition<TOptions = unknown> {
  /** `<category>/<kebab-name>` */
  id: string;
  category: RuleCategory;
  name: string;
  description: string;
  /** The guide's "Why?" bullet */
  rationale: string;
  /** Snippet showing the non-preferred form */
  avoid: string;
  /** Snippet showing the preferred form */
  prefer: string;
  defaultSeverity: Severity;
  optionsSchema: z.ZodType<TOptions, z.ZodTypeDef, unknown>;
  check(ctx: RuleContext<TOptions>): RuleFinding[];
}

export type AnyRuleDefinition = RuleDefinition<unknown>;

export interface Violation {
  ruleId: string;
  severity: Severity;
  /** Workspace-relative POSIX path */
  file: string;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
  message: string;
  suggestion?: string;
}

/**
 * Identity helper that keeps the options type tied to its schema.
 */
export function defineRule<TOptions>(rule: RuleDefinition<TOptions>): RuleDefinition<TOptions> {
  return rule;
}
