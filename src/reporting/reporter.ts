/**
 * @fileoverview Reporter
 *
 * Renders a LintResult for a terminal (`text`), for tooling (`json`) or as
 * GitHub Actions workflow commands (`github`).
 */

import { ConfigError } from '../core/errors.js';
import type { LintResult } from '../engine/evaluator.js';
import type { Violation } from '../rules/types.js';
import { CONVENTION_LINT_VERSION } from '../version.js';

export type ReportFormat = 'text' | 'json' | 'github';

export type Formatter = (result: LintResult) => string;

export const REPORT_FORMATS: readonly ReportFormat[] = ['text', 'json', 'github'];

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

function groupByFile(violations: readonly Violation[]): Map<string, Violation[]> {
  const groups = new Map<string, Violation[]>();
  for (const violation of violations) {
    const group = groups.get(violation.file);
    if (group) {
      group.push(violation);
    } else {
      groups.set(violation.file, [violation]);
    }
  }
  return groups;
}

// ============================================================================
// TEXT
// ============================================================================

export function formatText(result: LintResult): string {
  const lines: string[] = [];

  for (const [file, violations] of groupByFile(result.violations)) {
    lines.push(file);
    for (const v of violations) {
      lines.push(`  ${v.line}:${v.column}  ${v.severity.padEnd(7)}  ${v.message}  ${v.ruleId}`);
    }
    lines.push('');
  }

  if (result.skipped.length > 0) {
    for (const skipped of result.skipped) {
      lines.push(`skipped ${skipped.file} (${skipped.reason})`);
    }
    lines.push('');
  }

  const problems = result.errorCount + result.warningCount;
  if (problems === 0) {
    lines.push(`✔ No problems found in ${plural(result.files, 'file')}`);
  } else {
    lines.push(
      `✖ ${plural(problems, 'problem')} (${plural(result.errorCount, 'error')}, ${plural(result.warningCount, 'warning')})`,
    );
  }

  return lines.join('\n');
}

// ============================================================================
// JSON
// ============================================================================

export function formatJson(result: LintResult): string {
  return JSON.stringify(
    {
      version: CONVENTION_LINT_VERSION.string,
      files: result.files,
      errorCount: result.errorCount,
      warningCount: result.warningCount,
      skipped: result.skipped,
      violations: result.violations,
    },
    null,
    2,
  );
}

// ============================================================================
// GITHUB ACTIONS
// ============================================================================

function escapeData(value: string): string {
  return value.replace(/%/g, '%25').replace(/\r/g, '%0D').replace(/\n/g, '%0A');
}

function escapeProperty(value: string): string {
  return escapeData(value).replace(/:/g, '%3A').replace(/,/g, '%2C');
}

export function formatGithub(result: LintResult): string {
  const commands = result.violations.map((v) => {
    const properties = [
      `file=${escapeProperty(v.file)}`,
      `line=${v.line}`,
      `col=${v.column}`,
      `title=${escapeProperty(v.ruleId)}`,
    ].join(',');
    return `::${v.severity} ${properties}::${escapeData(v.message)}`;
  });
  for (const skipped of result.skipped) {
    commands.push(`::notice file=${escapeProperty(skipped.file)}::${escapeData(`Skipped (${skipped.reason})`)}`);
  }
  return commands.join('\n');
}

// ============================================================================
// LOOKUP
// ============================================================================

const FORMATTERS: Record<ReportFormat, Formatter> = {
  text: formatText,
  json: formatJson,
  github: formatGithub,
};

export function isReportFormat(value: string): value is ReportFormat {
  return REPORT_FORMATS.some((candidate) => candidate === value);
}

export function getFormatter(name: string): Formatter {
  if (!isReportFormat(name)) {
    throw new ConfigError('--format', `Unknown format "${name}". Expected one of: ${REPORT_FORMATS.join(', ')}`);
  }
  return FORMATTERS[name];
}
