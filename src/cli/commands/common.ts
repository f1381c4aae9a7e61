import { parseArgs, type ParseArgsConfig } from 'node:util';
import { getErrorMessage } from '../../utils/errors.js';
import { createError } from '../errors.js';

export interface CommandOptions {
  workspace: string;
  /** Positionals after the command name */
  args: string[];
  /** Full argument list, command name first */
  rawArgs: string[];
}

/** Accepted by every command so global flags never trip strict parsing */
export const GLOBAL_OPTIONS = {
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' },
  workspace: { type: 'string', short: 'w' },
  verbose: { type: 'boolean' },
} as const;

/**
 * `parseArgs` in strict mode, with its TypeErrors turned into
 * EINVALID_ARGUMENT CLI errors.
 */
export function parseCommandArgs<T extends ParseArgsConfig>(config: T): ReturnType<typeof parseArgs<T>> {
  try {
    return parseArgs(config);
  } catch (error) {
    throw createError('EINVALID_ARGUMENT', getErrorMessage(error));
  }
}
