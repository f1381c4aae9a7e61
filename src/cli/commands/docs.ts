/**
 * @fileoverview Docs Command
 *
 * Renders the rule registry as a style guide markdown document.
 *
 * Usage:
 *   convention-lint docs [--output <file>]
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { renderGuide } from '../../guide/render.js';
import { createDefaultRegistry } from '../../rules/registry.js';
import { logInfo } from '../../telemetry/logger.js';
import { GLOBAL_OPTIONS, parseCommandArgs, type CommandOptions } from './common.js';

export async function docsCommand(options: CommandOptions): Promise<number> {
  const { values } = parseCommandArgs({
    args: options.rawArgs.slice(1),
    options: {
      ...GLOBAL_OPTIONS,
      output: { type: 'string', short: 'o' },
    },
    allowPositionals: true,
  });

  const markdown = renderGuide(createDefaultRegistry());

  if (!values.output) {
    console.log(markdown);
    return 0;
  }

  const target = path.resolve(options.workspace, values.output);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, `${markdown}\n`, 'utf8');
  logInfo('Wrote style guide', { path: target });
  return 0;
}
