/**
 * Typed error classes for the workload policy engine
 *
 * Provides structured error handling with rich context for debugging,
 * logging, and programmatic error handling.
 *
 * Only two failure families ever reach a caller: a manifest that is not a
 * well-formed document ({@link StructuralError}) and rule configuration that
 * cannot be loaded ({@link ConfigurationError}). Missing fields and type
 * mismatches inside a rule are predicate outcomes, not errors.
 *
 * @module types/errors
 */

import { types } from 'util';
import { errorMessage } from '../utils';

/**
 * Error codes for categorizing engine errors.
 *
 * Codes are grouped by domain:
 * - `MANIFEST_*` -- Structural problems with the evaluated document
 * - `CONFIG_*` -- Engine configuration errors
 * - `RULE_*` -- Rule descriptor errors
 * - `EVALUATION_*` -- Evaluation lifecycle errors
 */
export const ErrorCode = {
  // Manifest errors (1xxx)
  MANIFEST_NOT_OBJECT: 'MANIFEST_NOT_OBJECT',
  MANIFEST_KIND_MISSING: 'MANIFEST_KIND_MISSING',

  // Configuration errors (2xxx)
  CONFIG_INVALID: 'CONFIG_INVALID',
  POLICY_FILE_UNREADABLE: 'POLICY_FILE_UNREADABLE',

  // Rule errors (3xxx)
  RULE_INVALID: 'RULE_INVALID',
  RULE_DUPLICATE_ID: 'RULE_DUPLICATE_ID',
  FIELD_PATH_INVALID: 'FIELD_PATH_INVALID',

  // Evaluation errors (4xxx)
  EVALUATION_CANCELLED: 'EVALUATION_CANCELLED',

  // Unknown
  UNKNOWN: 'UNKNOWN',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Error severity levels
 */
export type ErrorSeverity = 'critical' | 'error' | 'warning' | 'info';

/**
 * Context information for debugging
 */
export interface ErrorContext {
  /** The component or module where the error occurred */
  readonly component?: string;
  /** The operation being performed */
  readonly operation?: string;
  /** The resource involved (e.g., `Deployment/web`, a rule id, a file path) */
  readonly resource?: string;
  /** Additional key-value context */
  readonly metadata?: Record<string, unknown>;
  /** Stack trace from original error */
  readonly originalStack?: string;
}

/**
 * Base class for all engine errors
 *
 * @example
 * ```typescript
 * throw new PolicyEngineError(
 *   'Rule file could not be parsed',
 *   ErrorCode.POLICY_FILE_UNREADABLE,
 *   'error',
 *   { component: 'PolicyLoader', resource: 'rules/extra.yaml' },
 * );
 * ```
 */
export class PolicyEngineError extends Error {
  /** Unique error code for programmatic handling */
  public readonly code: ErrorCode;

  /** Severity level of the error */
  public readonly severity: ErrorSeverity;

  /** Contextual information for debugging */
  public readonly context: ErrorContext;

  /** Timestamp when error occurred */
  public readonly timestamp: Date;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    severity: ErrorSeverity = 'error',
    context: ErrorContext = {},
  ) {
    super(message);
    this.name = 'PolicyEngineError';
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.timestamp = new Date();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Create a formatted string for logging.
   *
   * @returns A single-line log string in the format `[SEVERITY] [CODE] message component=... operation=... resource=...`
   */
  toLogString(): string {
    const parts = [`[${this.severity.toUpperCase()}]`, `[${this.code}]`, this.message];

    if (this.context.component) {
      parts.push(`component=${this.context.component}`);
    }
    if (this.context.operation) {
      parts.push(`operation=${this.context.operation}`);
    }
    if (this.context.resource) {
      parts.push(`resource=${this.context.resource}`);
    }

    return parts.join(' ');
  }

  /**
   * Convert to a structured object for JSON logging.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
    };
  }

  /**
   * Wrap an unknown error into a PolicyEngineError.
   *
   * If the error is already a PolicyEngineError, it is returned as-is.
   * Otherwise the message is extracted and wrapped with the `UNKNOWN` code.
   *
   * @param error - The unknown error to wrap
   * @param context - Optional context to attach to the wrapped error
   */
  static wrap(error: unknown, context?: ErrorContext): PolicyEngineError {
    if (error instanceof PolicyEngineError) {
      return error;
    }

    const message = errorMessage(error);
    const originalStack = types.isNativeError(error) || error instanceof Error ? error.stack : undefined;

    return new PolicyEngineError(message, ErrorCode.UNKNOWN, 'error', { ...context, originalStack });
  }
}

/**
 * The evaluated document is not a well-formed manifest.
 *
 * Raised before any rule runs; no verdicts accompany it.
 *
 * @example
 * ```typescript
 * throw StructuralError.kindMissing();
 * ```
 */
export class StructuralError extends PolicyEngineError {
  constructor(message: string, code: ErrorCode = ErrorCode.MANIFEST_NOT_OBJECT, context: ErrorContext = {}) {
    super(message, code, 'error', {
      ...context,
      component: context.component ?? 'Evaluator',
      operation: context.operation ?? 'evaluate',
    });
    this.name = 'StructuralError';
  }

  /**
   * Create error for a root that is not a mapping.
   *
   * @param actual - The rejected root value
   */
  static notAnObject(actual: unknown): StructuralError {
    const described = actual === null ? 'null' : Array.isArray(actual) ? 'array' : typeof actual;
    return new StructuralError(`Manifest root must be a mapping, got ${described}`, ErrorCode.MANIFEST_NOT_OBJECT, {
      metadata: { actualType: described },
    });
  }

  /**
   * Create error for a manifest without a usable `kind`.
   */
  static kindMissing(): StructuralError {
    return new StructuralError('Manifest has no kind', ErrorCode.MANIFEST_KIND_MISSING);
  }
}

/**
 * Configuration-related errors
 *
 * Thrown when engine configuration, a rule descriptor, or a field path
 * fails validation. Rule configuration never degrades silently: a
 * descriptor that does not load aborts the registry load.
 *
 * @example
 * ```typescript
 * throw ConfigurationError.duplicateRule('container-cpu-requests');
 * ```
 */
export class ConfigurationError extends PolicyEngineError {
  /** The configuration field (or rule id) that caused the error */
  public readonly field: string;

  /** The invalid value */
  public readonly value: unknown;

  /** Individual problems when several were collected at once */
  public readonly issues: readonly string[];

  constructor(
    message: string,
    field: string,
    value: unknown,
    code: ErrorCode = ErrorCode.CONFIG_INVALID,
    context: ErrorContext = {},
    issues: readonly string[] = [],
  ) {
    super(message, code, 'error', {
      ...context,
      component: context.component ?? 'Configuration',
      metadata: { ...context.metadata, field, value },
    });
    this.name = 'ConfigurationError';
    this.field = field;
    this.value = value;
    this.issues = issues;
  }

  /**
   * Create error for one or more invalid rule descriptors.
   *
   * @param ruleRef - Rule id, or a positional reference such as `rules[3]`
   * @param issues - Every problem found, formatted as `path: message`
   */
  static invalidRule(ruleRef: string, issues: readonly string[], context?: ErrorContext): ConfigurationError {
    return new ConfigurationError(
      `Invalid rule descriptor ${ruleRef}: ${issues.join('; ')}`,
      ruleRef,
      undefined,
      ErrorCode.RULE_INVALID,
      { ...context, component: context?.component ?? 'RuleRegistry' },
      issues,
    );
  }

  /**
   * Create error for a rule id registered twice.
   */
  static duplicateRule(ruleId: string): ConfigurationError {
    return new ConfigurationError(
      `Rule '${ruleId}' is already registered`,
      ruleId,
      ruleId,
      ErrorCode.RULE_DUPLICATE_ID,
      { component: 'RuleRegistry', operation: 'register', resource: ruleId },
    );
  }

  /**
   * Create error for a field path that does not parse.
   *
   * @param path - The rejected path text
   * @param reason - What is wrong with it
   */
  static invalidFieldPath(path: string, reason: string): ConfigurationError {
    return new ConfigurationError(
      `Invalid field path '${path}': ${reason}`,
      'path',
      path,
      ErrorCode.FIELD_PATH_INVALID,
      { component: 'FieldAccessor', operation: 'parse' },
    );
  }

  /**
   * Create error for a policy or manifest file that cannot be read or parsed.
   */
  static unreadableFile(file: string, reason: string): ConfigurationError {
    return new ConfigurationError(
      `Cannot load '${file}': ${reason}`,
      'file',
      file,
      ErrorCode.POLICY_FILE_UNREADABLE,
      { component: 'PolicyLoader', operation: 'load', resource: file },
    );
  }
}

/**
 * Evaluation was aborted through its cancellation signal.
 */
export class EvaluationCancelledError extends PolicyEngineError {
  /** Rules that had completed before the signal was observed */
  public readonly completedRules: number;

  constructor(resource: string, completedRules: number, reason?: unknown) {
    const suffix = reason === undefined ? '' : `: ${errorMessage(reason)}`;
    super(`Evaluation of ${resource} cancelled${suffix}`, ErrorCode.EVALUATION_CANCELLED, 'warning', {
      component: 'Evaluator',
      operation: 'evaluate',
      resource,
      metadata: { completedRules },
    });
    this.name = 'EvaluationCancelledError';
    this.completedRules = completedRules;
  }
}

/**
 * Type guard to check if an error is a PolicyEngineError.
 */
export function isPolicyEngineError(error: unknown): error is PolicyEngineError {
  return error instanceof PolicyEngineError;
}

/**
 * Type guard to check if an error has a specific error code.
 *
 * @returns `true` if the error is a PolicyEngineError with the given code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
  return isPolicyEngineError(error) && error.code === code;
}
