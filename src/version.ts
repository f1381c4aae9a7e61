/**
 * Current convention-lint version.
 * Increment MINOR when rules are added, MAJOR when a rule's default severity
 * or the JSON report shape changes.
 */
export const CONVENTION_LINT_VERSION = {
  major: 0,
  minor: 1,
  patch: 0,
  string: '0.1.0',
} as const;
