/**
 * @fileoverview Rule Evaluator
 *
 * Applies each enabled rule to each scanned file and turns findings into
 * positioned violations. A rule that throws is isolated: it becomes an
 * `internal/rule-crash` violation and the remaining rules still run.
 */

import { settingsForFile, type ResolvedConfig } from '../config/loader.js';
import { getErrorMessage } from '../utils/errors.js';
import { logWarning } from '../telemetry/logger.js';
import type { RuleRegistry } from '../rules/registry.js';
import type { Violation } from '../rules/types.js';
import type { ScannedFile, SkippedFile } from '../scanner/source_scanner.js';
import { isSuppressed, parseSuppressions } from './suppressions.js';

export const PARSE_ERROR_RULE_ID = 'parse-error';
export const RULE_CRASH_RULE_ID = 'internal/rule-crash';

export interface EvaluateOptions {
  /** Restrict evaluation to these rule ids */
  ruleIds?: ReadonlySet<string>;
}

export interface LintResult {
  /** Number of files examined */
  files: number;
  violations: Violation[];
  skipped: SkippedFile[];
  errorCount: number;
  warningCount: number;
}

export function compareViolations(a: Violation, b: Violation): number {
  if (a.file !== b.file) return a.file < b.file ? -1 : 1;
  if (a.line !== b.line) return a.line - b.line;
  if (a.column !== b.column) return a.column - b.column;
  if (a.ruleId !== b.ruleId) return a.ruleId < b.ruleId ? -1 : 1;
  return 0;
}

export function buildLintResult(files: number, violations: Violation[], skipped: SkippedFile[] = []): LintResult {
  const sorted = [...violations].sort(compareViolations);
  return {
    files,
    violations: sorted,
    skipped,
    errorCount: sorted.filter((violation) => violation.severity === 'error').length,
    warningCount: sorted.filter((violation) => violation.severity === 'warning').length,
  };
}

export function evaluateFile(
  file: ScannedFile,
  registry: RuleRegistry,
  config: ResolvedConfig,
  options: EvaluateOptions = {},
): Violation[] {
  if (file.parseErrors.length > 0) {
    return file.parseErrors.map((error): Violation => ({
      ruleId: PARSE_ERROR_RULE_ID,
      severity: 'error',
      file: file.relPath,
      line: error.line,
      column: error.column,
      message: `Parsing error: ${error.message}`,
    }));
  }

  const { sourceFile, relPath } = file;
  const violations: Violation[] = [];

  for (const rule of registry.list()) {
    if (options.ruleIds && !options.ruleIds.has(rule.id)) continue;
    const settings = settingsForFile(config, relPath, rule);
    if (settings.level === 'off') continue;
    const severity = settings.level;

    try {
      const ruleOptions = rule.optionsSchema.parse(settings.options);
      for (const finding of rule.check({ sourceFile, relPath, options: ruleOptions })) {
        const { line, column } = sourceFile.getLineAndColumnAtPos(finding.node.getStart());
        violations.push({
          ruleId: rule.id,
          severity,
          file: relPath,
          line,
          column,
          message: finding.message,
          ...(finding.suggestion ? { suggestion: finding.suggestion } : {}),
        });
      }
    } catch (error) {
      const message = getErrorMessage(error);
      logWarning(`Rule ${rule.id} crashed on ${relPath}`, { error: message });
      violations.push({
        ruleId: RULE_CRASH_RULE_ID,
        severity: 'error',
        file: relPath,
        line: 1,
        column: 1,
        message: `Rule "${rule.id}" crashed: ${message}`,
      });
    }
  }

  const suppressions = parseSuppressions(sourceFile);
  return violations.filter((violation) => !isSuppressed(suppressions, violation.ruleId, violation.line));
}

export function evaluateFiles(
  files: readonly ScannedFile[],
  registry: RuleRegistry,
  config: ResolvedConfig,
  options: EvaluateOptions = {},
): Violation[] {
  return files.flatMap((file) => evaluateFile(file, registry, config, options));
}

/**
 * Exit status of a run: failing on any error, or on more warnings than
 * `maxWarnings` allows (negative means unlimited).
 */
export function exitCodeFor(result: Pick<LintResult, 'errorCount' | 'warningCount'>, maxWarnings: number): 0 | 1 {
  if (result.errorCount > 0) return 1;
  if (maxWarnings >= 0 && result.warningCount > maxWarnings) return 1;
  return 0;
}
