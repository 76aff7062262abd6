import { EvalError, ErrorSeverity } from './EvalError';

/**
 * Wraps an exception raised by the evaluated code itself. Only used when the
 * evaluator is configured with `evaluationErrors: 'wrap'`; otherwise the
 * original exception reaches the caller untouched.
 */
export class EvaluationError extends EvalError {
  public readonly unitName: string;

  constructor(unitName: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Evaluated code in ${unitName} threw: ${reason}`, {
      code: 'EVALUATION_FAILED',
      severity: ErrorSeverity.Recoverable,
      details: { unitName },
      cause
    });
    this.unitName = unitName;
  }
}
