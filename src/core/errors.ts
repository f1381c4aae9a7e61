/**
 * @fileoverview convention-lint error hierarchy
 *
 * Library code throws these typed errors; only the CLI turns them into
 * exit codes and envelopes.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class ConventionLintError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

export class ConfigError extends ConventionLintError {
  readonly code = 'CONFIG_ERROR';
  readonly retryable = false;

  constructor(
    readonly configPath: string,
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}\n${issues.map((issue) => `  - ${issue}`).join('\n')}` : message);
    this.name = 'ConfigError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        configPath: this.configPath,
        issues: this.issues,
      },
    };
  }
}

// ============================================================================
// REGISTRY ERRORS
// ============================================================================

export class RuleRegistryError extends ConventionLintError {
  readonly code = 'RULE_REGISTRY_ERROR';
  readonly retryable = false;

  constructor(
    readonly ruleId: string,
    message: string,
    readonly suggestions: string[] = [],
  ) {
    super(message);
    this.name = 'RuleRegistryError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        ruleId: this.ruleId,
        suggestions: this.suggestions,
      },
    };
  }
}

// ============================================================================
// SCAN ERRORS
// ============================================================================

export class ScanError extends ConventionLintError {
  readonly code = 'SCAN_ERROR';
  readonly retryable = false;

  constructor(
    readonly filePath: string,
    message: string,
  ) {
    super(`Failed to scan ${filePath}: ${message}`);
    this.name = 'ScanError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        filePath: this.filePath,
      },
    };
  }
}

// ============================================================================
// ERROR TYPE GUARDS
// ============================================================================

export function isConventionLintError(error: unknown): error is ConventionLintError {
  return error instanceof ConventionLintError;
}
