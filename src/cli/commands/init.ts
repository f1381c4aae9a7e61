/**
 * @fileoverview Init Command
 *
 * Writes `.convention-lint.yaml` with the default settings.
 *
 * Usage:
 *   convention-lint init [--force]
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { CONFIG_FILE_NAMES, DEFAULT_CONFIG_YAML } from '../../config/loader.js';
import { getErrorCode } from '../../utils/errors.js';
import { createError } from '../errors.js';
import { GLOBAL_OPTIONS, parseCommandArgs, type CommandOptions } from './common.js';

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') return false;
    throw error;
  }
}

export async function initCommand(options: CommandOptions): Promise<number> {
  const { values } = parseCommandArgs({
    args: options.rawArgs.slice(1),
    options: {
      ...GLOBAL_OPTIONS,
      force: { type: 'boolean' },
    },
    allowPositionals: true,
  });

  const fileName = CONFIG_FILE_NAMES[0];
  const target = path.join(options.workspace, fileName);
  if (!values.force && (await exists(target))) {
    throw createError('EFILE_EXISTS', `${fileName} already exists`, { path: target });
  }

  await fs.writeFile(target, DEFAULT_CONFIG_YAML, 'utf8');
  console.log(`Created ${fileName}`);
  return 0;
}
