/**
 * Core error handling for the significance toolkit
 *
 * Every failure raised by the library is an AbTestError carrying:
 * - A structured error code for the failure category
 * - A context object with the offending values
 * - A proper stack trace
 */

/**
 * Error codes, one per failure category
 */
export enum ErrorCode {
  // Caller errors
  INVALID_INPUT = 'INVALID_INPUT',

  // Statistical errors
  DEGENERATE_VARIANCE = 'DEGENERATE_VARIANCE',
  UNDEFINED_DOMAIN = 'UNDEFINED_DOMAIN',
  UNDEFINED_MSS = 'UNDEFINED_MSS',

  // Numerical errors
  CONVERGENCE_FAILED = 'CONVERGENCE_FAILED',

  // System errors
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

/**
 * Base error class with structured error codes and context
 *
 * @example
 * ```typescript
 * throw new AbTestError(
 *   ErrorCode.INVALID_INPUT,
 *   'Each group must have at least 2 observations',
 *   { controlCount: 1, treatmentCount: 12 }
 * );
 * ```
 */
export class AbTestError extends Error {
  /**
   * @param code - Structured error code for categorization
   * @param message - Human-readable error message
   * @param context - Optional context object for debugging
   */
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AbTestError';

    // V8 only
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Formatted representation including code and context
   */
  toString(): string {
    const contextStr = this.context ? ` Context: ${JSON.stringify(this.context)}` : '';
    return `${this.name} [${this.code}]: ${this.message}${contextStr}`;
  }

  /**
   * Check if this error matches a specific error code
   */
  is(code: ErrorCode): boolean {
    return this.code === code;
  }

  /**
   * Check if this error is in a category of error codes
   */
  isOneOf(codes: ErrorCode[]): boolean {
    return codes.includes(this.code);
  }
}

/**
 * Malformed or out-of-range input: counts, alpha/power bounds, sequence length
 */
export class ValidationError extends AbTestError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.INVALID_INPUT, message, context);
    this.name = 'ValidationError';
  }
}

/**
 * A zero-variance sample makes the test statistic undefined
 */
export class DegenerateVarianceError extends AbTestError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.DEGENERATE_VARIANCE, message, context);
    this.name = 'DegenerateVarianceError';
  }
}

/**
 * A value is requested outside the domain where it is defined,
 * e.g. relative uplift over a zero control estimate
 */
export class DomainError extends AbTestError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.UNDEFINED_DOMAIN, message, context);
    this.name = 'DomainError';
  }
}

/**
 * The required sample size is not a finite positive number
 */
export class UndefinedMssError extends AbTestError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.UNDEFINED_MSS, message, context);
    this.name = 'UndefinedMssError';
  }
}

/**
 * A bounded iterative solver ran out of iterations
 */
export class ConvergenceError extends AbTestError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ErrorCode.CONVERGENCE_FAILED, message, context);
    this.name = 'ConvergenceError';
  }
}

/**
 * Type guard to check if an error is an AbTestError
 */
export function isAbTestError(error: unknown): error is AbTestError {
  return error instanceof AbTestError;
}

/**
 * Wrap an unknown thrown value as an AbTestError
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.INTERNAL_ERROR): AbTestError {
  if (isAbTestError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const context =
    error instanceof Error ? { originalStack: error.stack } : { originalError: error };

  return new AbTestError(code, message, context);
}
