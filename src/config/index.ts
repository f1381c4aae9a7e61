/**
 * @fileoverview convention-lint configuration
 *
 * - `schema`: zod schema of `.convention-lint.yaml`
 * - `loader`: discovery, validation and per-file rule resolution
 */

export {
  ConfigFileSchema,
  OverrideSchema,
  RuleLevelSchema,
  RuleSettingSchema,
  type ConfigFile,
  type RuleSettingInput,
} from './schema.js';

export {
  BUILTIN_EXCLUDE,
  CONFIG_FILE_NAMES,
  CONFIG_PATH_ENV,
  DEFAULT_CONFIG_YAML,
  DEFAULT_INCLUDE,
  DEFAULT_MAX_FILE_BYTES,
  loadConfig,
  parseConfigText,
  resolveConfig,
  settingsForFile,
  validateRuleSettings,
  type ConfigOverride,
  type EffectiveRuleSettings,
  type LoadConfigOptions,
  type ResolvedConfig,
  type RuleSetting,
} from './loader.js';
