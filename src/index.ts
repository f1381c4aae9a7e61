/**
 * @fileoverview convention-lint public API
 *
 * Lint Angular, NgRx and RxJS sources against the documented conventions,
 * check style guide documents, and render the rule set as a guide.
 *
 * @example
 * ```typescript
 * import { lint, formatText } from 'convention-lint';
 *
 * const result = await lint(process.cwd(), { paths: ['src/app'] });
 * console.log(formatText(result));
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// ERRORS
// ============================================================================

export {
  ConventionLintError,
  ConfigError,
  RuleRegistryError,
  ScanError,
  isConventionLintError,
  type ErrorJSON,
} from './core/errors.js';

// ============================================================================
// RULES
// ============================================================================

export {
  RULE_CATEGORIES,
  defineRule,
  type AnyRuleDefinition,
  type RuleCategory,
  type RuleContext,
  type RuleDefinition,
  type RuleFinding,
  type RuleLevel,
  type Severity,
  type Violation,
} from './rules/types.js';
export { RuleRegistry, createDefaultRegistry, isRuleCategory, type RuleQuery } from './rules/registry.js';
export { BUILTIN_RULES } from './rules/builtin.js';

// ============================================================================
// CONFIG, SCANNING, EVALUATION
// ============================================================================

export * from './config/index.js';
export {
  SourceScanner,
  discoverFiles,
  pathsToIncludes,
  type ParseErrorLocation,
  type ScannedFile,
  type ScanOptions,
  type ScanResult,
  type SkippedFile,
} from './scanner/source_scanner.js';
export {
  PARSE_ERROR_RULE_ID,
  RULE_CRASH_RULE_ID,
  buildLintResult,
  evaluateFile,
  evaluateFiles,
  exitCodeFor,
  type EvaluateOptions,
  type LintResult,
} from './engine/evaluator.js';
export { isSuppressed, parseSuppressions, type SuppressionMap } from './engine/suppressions.js';
export { lint, type LintOptions, type WorkspaceLintResult } from './engine/lint.js';

// ============================================================================
// REPORTING
// ============================================================================

export {
  REPORT_FORMATS,
  formatGithub,
  formatJson,
  formatText,
  getFormatter,
  type Formatter,
  type ReportFormat,
} from './reporting/reporter.js';

// ============================================================================
// STYLE GUIDE
// ============================================================================

export { parseMarkdown, slugify, Slugger, type GuideDocument, type GuideHeading } from './guide/markdown.js';
export { GUIDE_CHECKS, lintGuide, type GuideCheck } from './guide/checks.js';
export { renderGuide, GUIDE_TITLE } from './guide/render.js';

// ============================================================================
// LOGGING
// ============================================================================

export { setLogLevel, getLogLevel, type LogLevel } from './telemetry/logger.js';

export { CONVENTION_LINT_VERSION } from './version.js';
