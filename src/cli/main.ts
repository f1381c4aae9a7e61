/**
 * @fileoverview CLI dispatcher
 *
 * Parses global options, routes to a command and maps whatever the command
 * throws to an ErrorEnvelope and an exit code. Returns the exit code rather
 * than exiting so it can be driven from tests.
 */

import * as path from 'node:path';
import { parseArgs } from 'node:util';
import { setLogLevel } from '../telemetry/logger.js';
import { CONVENTION_LINT_VERSION } from '../version.js';
import { showHelp } from './help.js';
import { checkCommand } from './commands/check.js';
import { rulesCommand } from './commands/rules.js';
import { explainCommand } from './commands/explain.js';
import { guideCommand } from './commands/guide.js';
import { docsCommand } from './commands/docs.js';
import { initCommand } from './commands/init.js';
import type { CommandOptions } from './commands/common.js';
import {
  classifyError,
  createErrorEnvelope,
  formatErrorJson,
  formatErrorWithHints,
  getExitCode,
  type ErrorEnvelope,
} from './errors.js';

type Command = 'check' | 'rules' | 'explain' | 'guide' | 'docs' | 'init';

const COMMANDS: Record<Command, { description: string; run: (options: CommandOptions) => Promise<number> }> = {
  check: { description: 'Lint the workspace or the given paths', run: checkCommand },
  rules: { description: 'List the available rules', run: rulesCommand },
  explain: { description: 'Show one rule with Avoid and Do examples', run: explainCommand },
  guide: { description: 'Check a style guide markdown document', run: guideCommand },
  docs: { description: 'Render the rules as a style guide document', run: docsCommand },
  init: { description: 'Write a default .convention-lint.yaml', run: initCommand },
};

function isCommand(value: string): value is Command {
  return Object.hasOwn(COMMANDS, value);
}

/**
 * Errors go to stderr as JSON when the report itself is JSON.
 */
function wantsJson(args: readonly string[]): boolean {
  const formatIndex = args.indexOf('--format');
  return args.includes('--json') || args.includes('--format=json') || (formatIndex >= 0 && args[formatIndex + 1] === 'json');
}

function outputStructuredError(envelope: ErrorEnvelope, useJson: boolean): void {
  console.error(useJson ? formatErrorJson(envelope) : formatErrorWithHints(envelope));
}

export async function runCli(args: string[]): Promise<number> {
  const jsonMode = wantsJson(args);

  try {
    const { values, positionals } = parseArgs({
      args,
      options: {
        help: { type: 'boolean', short: 'h', default: false },
        version: { type: 'boolean', short: 'v', default: false },
        workspace: { type: 'string', short: 'w' },
        verbose: { type: 'boolean', default: false },
      },
      allowPositionals: true,
      strict: false,
    });

    if (values.version === true) {
      console.log(`convention-lint ${CONVENTION_LINT_VERSION.string}`);
      return 0;
    }
    if (values.verbose === true) {
      setLogLevel('debug');
    }

    const command = positionals[0];
    if (values.help === true || !command || command === 'help') {
      showHelp(command === 'help' ? positionals[1] : command);
      return 0;
    }

    if (!isCommand(command)) {
      const envelope = createErrorEnvelope('EINVALID_ARGUMENT', `Unknown command: ${command}`, {
        recoveryHints: [
          `Run 'convention-lint help' for usage information`,
          `Available commands: ${Object.keys(COMMANDS).join(', ')}`,
        ],
        context: { command },
      });
      outputStructuredError(envelope, jsonMode);
      return getExitCode(envelope);
    }

    const workspace = path.resolve(typeof values.workspace === 'string' ? values.workspace : process.cwd());
    const commandIndex = args.indexOf(command);
    const rawArgs = [command, ...args.filter((_, index) => index !== commandIndex)];

    try {
      return await COMMANDS[command].run({ workspace, args: positionals.slice(1), rawArgs });
    } catch (error) {
      const envelope = classifyError(error);
      if (envelope.context) {
        envelope.context.command = command;
      }
      outputStructuredError(envelope, jsonMode);
      return getExitCode(envelope);
    }
  } catch (error) {
    const envelope = classifyError(error);
    outputStructuredError(envelope, jsonMode);
    return getExitCode(envelope);
  }
}
