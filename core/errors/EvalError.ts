/**
 * Defines the severity levels for evaluation errors.
 */
export enum ErrorSeverity {
  /** The calling application may decide to continue */
  Recoverable = 'recoverable',
  /** The evaluation cannot continue */
  Fatal = 'fatal',
}

/**
 * Base interface for error details.
 * Specific error types add their own fields.
 */
export interface BaseErrorDetails {
  [key: string]: unknown;
}

/**
 * Options for creating an EvalError instance.
 */
export interface EvalErrorOptions {
  code: string;
  severity: ErrorSeverity;
  details?: BaseErrorDetails;
  cause?: unknown;
}

/**
 * Base class for every error raised by the evaluation pipeline.
 * Provides structure for error codes, severity and details.
 */
export class EvalError extends Error {
  /** A unique code identifying the type of error */
  public readonly code: string;
  /** The severity level of the error */
  public readonly severity: ErrorSeverity;
  /** Additional context-specific details about the error */
  public readonly details?: BaseErrorDetails;

  constructor(message: string, options: EvalErrorOptions) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.code = options.code;
    this.severity = options.severity;
    this.details = options.details;

    // Standard way to maintain stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  public toString(): string {
    return `[${this.code}] ${this.message} (Severity: ${this.severity})`;
  }

  /**
   * Serializes the error to JSON.
   */
  public toJSON(): Record<string, unknown> {
    const result: Record<string, unknown> = {
      name: this.name,
      message: this.message,
      code: this.code,
      severity: this.severity,
    };

    if (this.details) {
      result.details = this.details;
    }

    if (this.cause !== undefined) {
      result.cause = this.cause instanceof Error ? this.cause.message : String(this.cause);
    }

    return result;
  }
}
