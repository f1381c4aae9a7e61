/**
 * @fileoverview Workspace lint pipeline: config → scan → evaluate.
 */

import { loadConfig, type ResolvedConfig } from '../config/loader.js';
import { logDebug } from '../telemetry/logger.js';
import { createDefaultRegistry, type RuleRegistry } from '../rules/registry.js';
import { pathsToIncludes, SourceScanner } from '../scanner/source_scanner.js';
import { buildLintResult, evaluateFiles, type LintResult } from './evaluator.js';

export interface LintOptions {
  configPath?: string;
  /** Files, directories or globs to lint instead of the configured includes */
  paths?: string[];
  /** Only run these rules */
  rules?: string[];
  registry?: RuleRegistry;
}

export interface WorkspaceLintResult extends LintResult {
  config: ResolvedConfig;
}

export async function lint(workspace: string, options: LintOptions = {}): Promise<WorkspaceLintResult> {
  const registry = options.registry ?? createDefaultRegistry();
  const config = await loadConfig(workspace, { configPath: options.configPath, registry });
  const ruleIds =
    options.rules && options.rules.length > 0
      ? new Set(options.rules.map((id) => registry.require(id).id))
      : undefined;
  const include =
    options.paths && options.paths.length > 0 ? await pathsToIncludes(workspace, options.paths) : config.include;

  const scanner = new SourceScanner();
  const scan = await scanner.scanWorkspace(workspace, {
    include,
    exclude: config.exclude,
    maxFileBytes: config.maxFileBytes,
  });
  const violations = evaluateFiles(scan.files, registry, config, { ruleIds });
  logDebug('Lint finished', { files: scan.files.length, violations: violations.length });

  return { ...buildLintResult(scan.files.length, violations, scan.skipped), config };
}
