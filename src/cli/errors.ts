/**
 * @fileoverview CLI error handling
 *
 * Every failure that reaches the CLI is turned into an ErrorEnvelope: a
 * machine-readable code, a message, recovery hints and context. The code
 * decides the process exit status.
 */

import { ConfigError, RuleRegistryError, ScanError } from '../core/errors.js';

// ============================================================================
// CODES
// ============================================================================

export const ErrorCodes = {
  EINVALID_ARGUMENT: 'EINVALID_ARGUMENT',
  EUNKNOWN_RULE: 'EUNKNOWN_RULE',
  EFILE_EXISTS: 'EFILE_EXISTS',
  ECONFIG_INVALID: 'ECONFIG_INVALID',
  ESCAN_FAILED: 'ESCAN_FAILED',
  EUNKNOWN: 'EUNKNOWN',
} as const;

export type ErrorCode = keyof typeof ErrorCodes;

/** Exit status of a lint run that found errors or too many warnings */
export const LINT_FAILURE_EXIT_CODE = 1;

export const ExitCodes: Record<ErrorCode, number> = {
  EINVALID_ARGUMENT: 2,
  EUNKNOWN_RULE: 2,
  EFILE_EXISTS: 2,
  ECONFIG_INVALID: 3,
  ESCAN_FAILED: 4,
  EUNKNOWN: 70,
};

export const ErrorMetadata: Record<ErrorCode, { retryable: boolean; recoveryHints: string[] }> = {
  EINVALID_ARGUMENT: {
    retryable: false,
    recoveryHints: ['Run `convention-lint help <command>` for usage information'],
  },
  EUNKNOWN_RULE: {
    retryable: false,
    recoveryHints: ['Run `convention-lint rules` to list the available rule ids'],
  },
  EFILE_EXISTS: {
    retryable: false,
    recoveryHints: ['Pass --force to overwrite the existing file'],
  },
  ECONFIG_INVALID: {
    retryable: false,
    recoveryHints: ['Fix the listed fields in the config file', 'Run `convention-lint init --force` to start from the defaults'],
  },
  ESCAN_FAILED: {
    retryable: false,
    recoveryHints: ['Check that the path exists and is readable'],
  },
  EUNKNOWN: {
    retryable: false,
    recoveryHints: ['Re-run with --verbose for more detail'],
  },
};

// ============================================================================
// ENVELOPE
// ============================================================================

export interface ErrorEnvelope {
  code: ErrorCode;
  message: string;
  retryable: boolean;
  recoveryHints: string[];
  context?: Record<string, unknown>;
}

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export function createError(code: ErrorCode, message: string, details?: Record<string, unknown>): CliError {
  return new CliError(message, code, ErrorMetadata[code].recoveryHints[0], details);
}

export function createErrorEnvelope(
  code: ErrorCode,
  message: string,
  overrides: Partial<Pick<ErrorEnvelope, 'retryable' | 'recoveryHints' | 'context'>> = {},
): ErrorEnvelope {
  const metadata = ErrorMetadata[code];
  return {
    code,
    message,
    retryable: overrides.retryable ?? metadata.retryable,
    recoveryHints: overrides.recoveryHints ?? [...metadata.recoveryHints],
    context: { ...overrides.context, timestamp: new Date().toISOString() },
  };
}

function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && Object.hasOwn(ErrorCodes, value);
}

export function isErrorEnvelope(value: unknown): value is ErrorEnvelope {
  if (!value || typeof value !== 'object') return false;
  return (
    'code' in value &&
    isErrorCode(value.code) &&
    'message' in value &&
    typeof value.message === 'string' &&
    'retryable' in value &&
    typeof value.retryable === 'boolean' &&
    'recoveryHints' in value &&
    Array.isArray(value.recoveryHints)
  );
}

/**
 * Maps anything thrown to an envelope. Library errors keep their details as
 * context; anything unrecognised becomes EUNKNOWN.
 */
export function classifyError(error: unknown): ErrorEnvelope {
  if (isErrorEnvelope(error)) return error;

  if (error instanceof CliError) {
    return createErrorEnvelope(error.code, error.message, {
      recoveryHints: error.suggestion ? [error.suggestion] : undefined,
      context: error.details,
    });
  }

  if (error instanceof ConfigError) {
    return createErrorEnvelope('ECONFIG_INVALID', error.message, {
      context: { configPath: error.configPath, issues: error.issues },
    });
  }

  if (error instanceof RuleRegistryError) {
    const hints = error.suggestions.map((id) => `Did you mean \`${id}\`?`);
    return createErrorEnvelope('EUNKNOWN_RULE', error.message, {
      recoveryHints: [...hints, ...ErrorMetadata.EUNKNOWN_RULE.recoveryHints],
      context: { ruleId: error.ruleId, suggestions: error.suggestions },
    });
  }

  if (error instanceof ScanError) {
    return createErrorEnvelope('ESCAN_FAILED', error.message, { context: { filePath: error.filePath } });
  }

  if (error instanceof Error) {
    return createErrorEnvelope('EUNKNOWN', error.message, { context: { name: error.name } });
  }

  return createErrorEnvelope('EUNKNOWN', String(error));
}

export function getExitCode(envelope: ErrorEnvelope): number {
  return ExitCodes[envelope.code];
}

// ============================================================================
// RENDERING
// ============================================================================

export function formatErrorWithHints(envelope: ErrorEnvelope): string {
  const lines = [`Error [${envelope.code}]: ${envelope.message}`];
  if (envelope.recoveryHints.length > 0) {
    lines.push('', 'Recovery suggestions:', ...envelope.recoveryHints.map((hint) => `  - ${hint}`));
  }
  if (envelope.retryable) {
    lines.push('', '(This error is retryable)');
  }
  return lines.join('\n');
}

export function formatErrorJson(envelope: ErrorEnvelope): string {
  return JSON.stringify({ error: envelope }, null, 2);
}
