/**
 * @fileoverview Check Command
 *
 * Lints the workspace (or the given paths) and prints the report.
 *
 * Usage:
 *   convention-lint check [paths...] [--format text|json|github] [--config <path>]
 *                         [--max-warnings <n>] [--rule <id>]...
 *
 * @packageDocumentation
 */

import { lint } from '../../engine/lint.js';
import { exitCodeFor } from '../../engine/evaluator.js';
import { getFormatter, isReportFormat, REPORT_FORMATS } from '../../reporting/reporter.js';
import { createError, LINT_FAILURE_EXIT_CODE } from '../errors.js';
import { GLOBAL_OPTIONS, parseCommandArgs, type CommandOptions } from './common.js';

export function parseMaxWarnings(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < -1) {
    throw createError('EINVALID_ARGUMENT', `--max-warnings must be an integer >= -1, got "${raw}"`);
  }
  return value;
}

export async function checkCommand(options: CommandOptions): Promise<number> {
  const { workspace, rawArgs } = options;

  const { values, positionals } = parseCommandArgs({
    args: rawArgs.slice(1),
    options: {
      ...GLOBAL_OPTIONS,
      format: { type: 'string' },
      config: { type: 'string' },
      'max-warnings': { type: 'string' },
      rule: { type: 'string', multiple: true },
    },
    allowPositionals: true,
  });

  const format = values.format ?? 'text';
  if (!isReportFormat(format)) {
    throw createError('EINVALID_ARGUMENT', `Unknown format "${format}". Expected one of: ${REPORT_FORMATS.join(', ')}`);
  }
  const maxWarnings = parseMaxWarnings(values['max-warnings']);

  const result = await lint(workspace, {
    configPath: values.config,
    paths: positionals,
    rules: values.rule,
  });

  const output = getFormatter(format)(result);
  if (output) console.log(output);

  return exitCodeFor(result, maxWarnings ?? result.config.maxWarnings) === 0 ? 0 : LINT_FAILURE_EXIT_CODE;
}
