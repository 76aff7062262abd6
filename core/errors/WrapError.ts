import { EvalError, ErrorSeverity } from './EvalError';

export type WrapErrorCode = 'WRAP_FAILED' | 'SOURCE_READ_FAILED' | 'INVALID_UNIT_NAME';

export interface WrapErrorDetails {
  unitName?: string;
  filePath?: string;
  [key: string]: unknown;
}

/**
 * Raised when source text cannot be embedded into a generated unit:
 * the source file cannot be read, or the wrapped file cannot be written.
 */
export class WrapError extends EvalError {
  constructor(
    message: string,
    options: { code?: WrapErrorCode; details?: WrapErrorDetails; cause?: unknown } = {}
  ) {
    super(message, {
      code: options.code ?? 'WRAP_FAILED',
      severity: ErrorSeverity.Fatal,
      details: options.details,
      cause: options.cause
    });
  }
}
