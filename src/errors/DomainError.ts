/**
 * Domain Error Base Class
 * Provides structured error handling with error codes, HTTP status mapping,
 * and retry capability information.
 */

// ============================================================================
// Error Codes
// ============================================================================

export type ErrorCode =
  // Input Errors (1xxx)
  | 'INPUT_001' // Subject and body both empty
  | 'INPUT_002' // Malformed request payload
  // Configuration Errors (2xxx)
  | 'CONFIG_001' // Configuration file missing or unreadable
  | 'CONFIG_002' // Configuration content invalid
  // Classifier Errors (3xxx)
  | 'CLASSIFIER_001' // Classifier unavailable
  | 'CLASSIFIER_002' // Classifier timed out
  | 'CLASSIFIER_003' // Classifier returned an invalid response
  // Generic Errors
  | 'UNKNOWN';

// ============================================================================
// Base Domain Error
// ============================================================================

export interface DomainErrorContext {
  /** Original error that caused this error */
  cause?: Error;
  /** File path if applicable */
  filePath?: string;
  /** Additional context */
  [key: string]: unknown;
}

export abstract class DomainError extends Error {
  /** Unique error code for categorization */
  abstract readonly code: ErrorCode;
  /** HTTP status code to return */
  abstract readonly httpStatus: number;
  /** Whether the operation can be retried */
  readonly isRetryable: boolean;
  /** Additional context about the error */
  readonly context: DomainErrorContext;
  /** Timestamp when error occurred */
  readonly timestamp: Date;

  constructor(
    message: string,
    context: DomainErrorContext = {},
    isRetryable = false
  ) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.isRetryable = isRetryable;
    this.timestamp = new Date();

    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to a JSON-serializable object for logging/API responses.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      isRetryable: this.isRetryable,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack,
    };
  }
}

// ============================================================================
// Input Errors
// ============================================================================

export class InputError extends DomainError {
  readonly code: ErrorCode;
  readonly httpStatus = 400;

  constructor(message: string, code: ErrorCode = 'INPUT_002', context: DomainErrorContext = {}) {
    super(message, context, false);
    this.code = code;
  }

  static emptyEmail(): InputError {
    return new InputError('Email subject and body are both empty', 'INPUT_001');
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

export interface ConfigurationIssue {
  path: string;
  message: string;
}

export class ConfigurationError extends DomainError {
  readonly code: ErrorCode;
  readonly httpStatus = 500;

  constructor(
    message: string,
    code: ErrorCode,
    public readonly issues: ConfigurationIssue[] = [],
    context: DomainErrorContext = {}
  ) {
    super(message, { ...context, issues }, false);
    this.code = code;
  }

  static unreadable(filePath: string, cause?: Error): ConfigurationError {
    return new ConfigurationError(
      `Configuration file could not be read: ${filePath}`,
      'CONFIG_001',
      [],
      { filePath, cause }
    );
  }

  static invalid(source: string, issues: ConfigurationIssue[]): ConfigurationError {
    const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
    return new ConfigurationError(
      `Invalid configuration in ${source}: ${summary}`,
      'CONFIG_002',
      issues,
      { source }
    );
  }
}

// ============================================================================
// Classifier Errors
// ============================================================================

export type ClassifierFailureReason = 'unavailable' | 'timeout' | 'error';

export class ClassifierUnavailableError extends DomainError {
  readonly code: ErrorCode;
  readonly httpStatus = 503;

  constructor(
    message: string,
    code: ErrorCode,
    public readonly reason: ClassifierFailureReason,
    context: DomainErrorContext = {}
  ) {
    super(message, { ...context, reason }, true);
    this.code = code;
  }

  static unavailable(details?: string, cause?: Error): ClassifierUnavailableError {
    return new ClassifierUnavailableError(
      `Statistical classifier unavailable${details ? ': ' + details : ''}`,
      'CLASSIFIER_001',
      'unavailable',
      { cause }
    );
  }

  static timeout(classifier: string, timeoutMs: number): ClassifierUnavailableError {
    return new ClassifierUnavailableError(
      `${classifier} timed out after ${timeoutMs}ms`,
      'CLASSIFIER_002',
      'timeout',
      { timeoutMs }
    );
  }

  static invalidResponse(classifier: string, details: string): ClassifierUnavailableError {
    return new ClassifierUnavailableError(
      `${classifier} returned an invalid response: ${details}`,
      'CLASSIFIER_003',
      'error',
      {}
    );
  }
}

// ============================================================================
// Error Utilities
// ============================================================================

/**
 * Check if an error is a DomainError.
 */
export function isDomainError(error: unknown): error is DomainError {
  return error instanceof DomainError;
}

class UnknownError extends DomainError {
  readonly code: ErrorCode = 'UNKNOWN';
  readonly httpStatus = 500;
}

/**
 * Wrap an unknown error in a DomainError if it isn't one already.
 */
export function wrapError(error: unknown, defaultMessage = 'An unexpected error occurred'): DomainError {
  if (isDomainError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : defaultMessage;
  const cause = error instanceof Error ? error : undefined;

  return new UnknownError(message, { cause });
}
