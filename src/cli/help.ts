/**
 * @fileoverview Detailed help text for convention-lint CLI commands
 */

const HELP_TEXT = {
  main: `
convention-lint - Angular, NgRx and RxJS convention linter

USAGE:
    convention-lint <command> [options]

COMMANDS:
    check [paths...]    Lint the workspace or the given files and directories
    rules               List the available rules
    explain <rule-id>   Show a rule's rationale with Avoid and Do examples
    guide <file.md>     Check a style guide markdown document
    docs                Render the rules as a style guide document
    init                Write a default .convention-lint.yaml
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    -w, --workspace     Set workspace directory (default: current directory)
    --verbose           Enable debug logging on stderr

EXIT CODES:
    0   No errors, warnings within --max-warnings
    1   Errors found, or too many warnings
    2   Invalid argument or unknown rule
    3   Invalid configuration
    4   A file could not be read
    70  Unexpected internal error

For more information on a specific command, run:
    convention-lint help <command>
`,

  check: `
convention-lint check - Lint TypeScript sources

USAGE:
    convention-lint check [paths...] [options]

OPTIONS:
    --format <f>        Output format: text (default), json, github
    --config <path>     Config file (default: .convention-lint.yaml in the workspace)
    --max-warnings <n>  Fail when warnings exceed n; -1 means unlimited
    --rule <id>         Only run this rule; repeatable

DESCRIPTION:
    Without paths, lints the files matched by the config's include globs.
    A directory argument covers its .ts and .tsx files; a glob passes through.

    Suppress a finding with a comment:
        // convention-lint-disable-next-line rxjs/finnish-notation
        foo(); // convention-lint-disable-line
        /* convention-lint-disable-file ngrx/no-inline-selector */

EXAMPLES:
    convention-lint check
    convention-lint check src/app --format github
    convention-lint check --rule rxjs/no-nested-subscribe --max-warnings 0
`,

  rules: `
convention-lint rules - List the available rules

USAGE:
    convention-lint rules [--category angular|ngrx|rxjs] [--json]
`,

  explain: `
convention-lint explain - Show one rule

USAGE:
    convention-lint explain <rule-id>

EXAMPLES:
    convention-lint explain angular/subscription-cleanup
`,

  guide: `
convention-lint guide - Check a style guide document

USAGE:
    convention-lint guide <file.md> [--format text|json|github]

DESCRIPTION:
    Checks that every in-document link resolves to a heading, that every
    numbered entry has a "Do" or "Avoid" bullet, and that every ts, tsx, js
    and jsx code block parses. A line holding only "..." is ignored.
`,

  docs: `
convention-lint docs - Render the rules as a style guide

USAGE:
    convention-lint docs [--output <file>]

DESCRIPTION:
    Prints markdown to stdout, or writes it to --output.
`,

  init: `
convention-lint init - Create a configuration file

USAGE:
    convention-lint init [--force]

OPTIONS:
    --force             Overwrite an existing .convention-lint.yaml
`,
};

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(value: string): value is HelpTopic {
  return Object.hasOwn(HELP_TEXT, value);
}

export function showHelp(command?: string): void {
  if (command && isHelpTopic(command)) {
    console.log(HELP_TEXT[command]);
  } else if (command) {
    console.log(`Unknown command: ${command}`);
    console.log(HELP_TEXT.main);
  } else {
    console.log(HELP_TEXT.main);
  }
}

export function getCommandHelp(command: string): string {
  return isHelpTopic(command) ? HELP_TEXT[command] : HELP_TEXT.main;
}
