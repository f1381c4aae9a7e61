/**
 * @fileoverview Runs a single rule over an inline fixture.
 */

import type { AnyRuleDefinition } from '../../rules/types.js';
import { SourceScanner } from '../../scanner/source_scanner.js';

export interface FindingSummary {
  line: number;
  column: number;
  message: string;
  suggestion?: string;
}

export function runRule(
  rule: AnyRuleDefinition,
  code: string,
  options?: Record<string, unknown>,
  relPath = 'src/app/fixture.ts',
): FindingSummary[] {
  const file = new SourceScanner().parse(relPath, code);
  if (file.parseErrors.length > 0) {
    throw new Error(`Fixture does not parse: ${file.parseErrors.map((error) => error.message).join('; ')}`);
  }
  const findings = rule.check({
    sourceFile: file.sourceFile,
    relPath,
    options: rule.optionsSchema.parse(options),
  });
  return findings.map((finding) => {
    const { line, column } = file.sourceFile.getLineAndColumnAtPos(finding.node.getStart());
    return {
      line,
      column,
      message: finding.message,
      ...(finding.suggestion ? { suggestion: finding.suggestion } : {}),
    };
  });
}

export function messagesOf(rule: AnyRuleDefinition, code: string, options?: Record<string, unknown>): string[] {
  return runRule(rule, code, options).map((finding) => finding.message);
}
