#!/usr/bin/env node
/**
 * @fileoverview convention-lint CLI
 *
 * Commands:
 *   convention-lint check [paths...]   - Lint TypeScript sources
 *   convention-lint rules              - List the available rules
 *   convention-lint explain <rule-id>  - Show one rule
 *   convention-lint guide <file.md>    - Check a style guide document
 *   convention-lint docs               - Render the rules as a style guide
 *   convention-lint init [--force]     - Write a default config file
 *
 * @packageDocumentation
 */

import { runCli } from './main.js';

process.exitCode = await runCli(process.argv.slice(2));
