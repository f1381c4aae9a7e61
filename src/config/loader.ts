/**
 * @fileoverview Configuration loading and per-file rule resolution
 *
 * Reads `.convention-lint.yaml`, validates it, checks every rule id and rule
 * options block against the registry, and answers "which severity and
 * options does rule X have for file Y" with overrides applied.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import YAML from 'yaml';
import { minimatch } from 'minimatch';
import type { ZodIssue } from 'zod';
import { ConfigError } from '../core/errors.js';
import { getErrorCode, getErrorMessage } from '../utils/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { createDefaultRegistry, type RuleRegistry } from '../rules/registry.js';
import type { AnyRuleDefinition, RuleLevel } from '../rules/types.js';
import { ConfigFileSchema, type ConfigFile, type RuleSettingInput } from './schema.js';

// ============================================================================
// DEFAULTS
// ============================================================================

export const CONFIG_FILE_NAMES = ['.convention-lint.yaml', '.convention-lint.yml'] as const;
export const CONFIG_PATH_ENV = 'CONVENTION_LINT_CONFIG';

export const DEFAULT_INCLUDE = ['src/**/*.ts', 'src/**/*.tsx'];
export const BUILTIN_EXCLUDE = ['**/node_modules/**', '**/dist/**', '**/*.d.ts'];
export const DEFAULT_MAX_FILE_BYTES = 1_000_000;

export const DEFAULT_CONFIG_YAML = `# convention-lint configuration
include:
  - src/**/*.ts
  - src/**/*.tsx
exclude: []
maxWarnings: -1
rules:
  angular/component-selector: [error, { prefix: app }]
overrides:
  - files: ['**/*.spec.ts']
    rules:
      angular/subscription-cleanup: off
`;

// ============================================================================
// TYPES
// ============================================================================

export interface RuleSetting {
  level: RuleLevel;
  options?: Record<string, unknown>;
}

export interface ConfigOverride {
  files: string[];
  rules: Record<string, RuleSetting>;
}

export interface ResolvedConfig {
  /** Absolute path of the file the config came from, if any */
  configPath?: string;
  include: string[];
  /** User excludes followed by the built-in ones */
  exclude: string[];
  maxFileBytes: number;
  maxWarnings: number;
  rules: Record<string, RuleSetting>;
  overrides: ConfigOverride[];
}

export interface EffectiveRuleSettings {
  level: RuleLevel;
  options: unknown;
}

export interface LoadConfigOptions {
  /** Explicit config path, relative to the workspace; overrides discovery */
  configPath?: string;
  registry?: RuleRegistry;
}

// ============================================================================
// RESOLUTION
// ============================================================================

function normalizeSetting(input: RuleSettingInput): RuleSetting {
  if (typeof input === 'string') return { level: input };
  if (input.length === 2) return { level: input[0], options: input[1] };
  return { level: input[0] };
}

function normalizeSettings(input: Record<string, RuleSettingInput> | undefined): Record<string, RuleSetting> {
  const out: Record<string, RuleSetting> = {};
  for (const [id, setting] of Object.entries(input ?? {})) {
    out[id] = normalizeSetting(setting);
  }
  return out;
}

export function resolveConfig(file: ConfigFile = {}, configPath?: string): ResolvedConfig {
  return {
    configPath,
    include: file.include ?? [...DEFAULT_INCLUDE],
    exclude: [...(file.exclude ?? []), ...BUILTIN_EXCLUDE],
    maxFileBytes: file.maxFileBytes ?? DEFAULT_MAX_FILE_BYTES,
    maxWarnings: file.maxWarnings ?? -1,
    rules: normalizeSettings(file.rules),
    overrides: (file.overrides ?? []).map((override) => ({
      files: override.files,
      rules: normalizeSettings(override.rules),
    })),
  };
}

/**
 * Every rule id must be registered, and every options block must satisfy the
 * rule's schema. All problems are collected into one ConfigError.
 */
export function validateRuleSettings(config: ResolvedConfig, registry: RuleRegistry): void {
  const issues: string[] = [];
  const blocks: Array<{ where: string; rules: Record<string, RuleSetting> }> = [
    { where: 'rules', rules: config.rules },
    ...config.overrides.map((override, index) => ({ where: `overrides.${index}.rules`, rules: override.rules })),
  ];

  for (const { where, rules } of blocks) {
    for (const [id, setting] of Object.entries(rules)) {
      const rule = registry.get(id);
      if (!rule) {
        const suggestions = registry.suggest(id);
        const hint = suggestions.length > 0 ? ` (did you mean "${suggestions[0]}"?)` : '';
        issues.push(`${where}.${id}: unknown rule${hint}`);
        continue;
      }
      if (setting.options === undefined) continue;
      const parsed = rule.optionsSchema.safeParse(setting.options);
      if (!parsed.success) {
        issues.push(...parsed.error.issues.map((issue) => `${where}.${id}: ${formatIssue(issue)}`));
      }
    }
  }

  if (issues.length > 0) {
    throw new ConfigError(config.configPath ?? '<defaults>', 'Invalid rule configuration', issues);
  }
}

function formatIssue(issue: ZodIssue): string {
  const location = issue.path.join('.');
  return location ? `${location}: ${issue.message}` : issue.message;
}

/**
 * Effective level and options of `rule` for one file: the rule's default,
 * then the top-level `rules` entry, then every matching override in order.
 */
export function settingsForFile(config: ResolvedConfig, relPath: string, rule: AnyRuleDefinition): EffectiveRuleSettings {
  let level: RuleLevel = rule.defaultSeverity;
  let options: Record<string, unknown> | undefined;

  const apply = (setting: RuleSetting | undefined): void => {
    if (!setting) return;
    level = setting.level;
    if (setting.options !== undefined) options = setting.options;
  };

  apply(config.rules[rule.id]);
  for (const override of config.overrides) {
    if (override.files.some((pattern) => minimatch(relPath, pattern, { dot: true }))) {
      apply(override.rules[rule.id]);
    }
  }

  return { level, options };
}

// ============================================================================
// LOADING
// ============================================================================

async function findConfigFile(workspace: string): Promise<string | undefined> {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.join(workspace, name);
    try {
      const stat = await fs.stat(candidate);
      if (stat.isFile()) return candidate;
    } catch (error) {
      if (getErrorCode(error) !== 'ENOENT') {
        throw new ConfigError(candidate, `Cannot access config file: ${getErrorMessage(error)}`);
      }
    }
  }
  return undefined;
}

export function parseConfigText(text: string, configPath: string): ConfigFile {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (error) {
    throw new ConfigError(configPath, `Invalid YAML: ${getErrorMessage(error)}`);
  }
  const parsed = ConfigFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(configPath, 'Invalid configuration', parsed.error.issues.map(formatIssue));
  }
  return parsed.data;
}

export async function loadConfig(workspace: string, options: LoadConfigOptions = {}): Promise<ResolvedConfig> {
  const registry = options.registry ?? createDefaultRegistry();
  const explicit = options.configPath ?? process.env[CONFIG_PATH_ENV];
  const configPath = explicit ? path.resolve(workspace, explicit) : await findConfigFile(workspace);

  if (!configPath) {
    logDebug('No config file found, using defaults', { workspace });
    return resolveConfig();
  }

  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf8');
  } catch (error) {
    const reason = getErrorCode(error) === 'ENOENT' ? 'Config file not found' : `Cannot read config file: ${getErrorMessage(error)}`;
    throw new ConfigError(configPath, reason);
  }

  const config = resolveConfig(parseConfigText(text, configPath), configPath);
  validateRuleSettings(config, registry);
  logDebug('Loaded config', { configPath, rules: Object.keys(config.rules).length });
  return config;
}
