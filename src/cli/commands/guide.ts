/**
 * @fileoverview Guide Command
 *
 * Runs the style guide document checks on a markdown file.
 *
 * Usage:
 *   convention-lint guide <file.md> [--format text|json|github]
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ScanError } from '../../core/errors.js';
import { exitCodeFor } from '../../engine/evaluator.js';
import { lintGuide } from '../../guide/checks.js';
import { getFormatter, isReportFormat, REPORT_FORMATS } from '../../reporting/reporter.js';
import { toPosixPath } from '../../scanner/source_scanner.js';
import { getErrorMessage } from '../../utils/errors.js';
import { createError, LINT_FAILURE_EXIT_CODE } from '../errors.js';
import { GLOBAL_OPTIONS, parseCommandArgs, type CommandOptions } from './common.js';

export async function guideCommand(options: CommandOptions): Promise<number> {
  const { workspace, rawArgs } = options;

  const { values, positionals } = parseCommandArgs({
    args: rawArgs.slice(1),
    options: {
      ...GLOBAL_OPTIONS,
      format: { type: 'string' },
    },
    allowPositionals: true,
  });

  const file = positionals[0];
  if (!file) {
    throw createError('EINVALID_ARGUMENT', 'A markdown file is required. Usage: convention-lint guide <file.md>');
  }
  const format = values.format ?? 'text';
  if (!isReportFormat(format)) {
    throw createError('EINVALID_ARGUMENT', `Unknown format "${format}". Expected one of: ${REPORT_FORMATS.join(', ')}`);
  }

  const absolute = path.resolve(workspace, file);
  let text: string;
  try {
    text = await fs.readFile(absolute, 'utf8');
  } catch (error) {
    throw new ScanError(file, getErrorMessage(error));
  }

  const result = lintGuide(toPosixPath(path.relative(workspace, absolute)), text);
  const output = getFormatter(format)(result);
  if (output) console.log(output);

  return exitCodeFor(result, -1) === 0 ? 0 : LINT_FAILURE_EXIT_CODE;
}
