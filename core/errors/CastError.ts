import type { ZodIssue } from 'zod';
import { EvalError, ErrorSeverity } from './EvalError';

/**
 * The evaluated value does not match the type the caller asked for.
 */
export class CastError extends EvalError {
  public readonly issues: readonly ZodIssue[];
  /** Runtime type name of the value that failed the check */
  public readonly actualType: string;

  constructor(unitName: string, actualType: string, issues: readonly ZodIssue[]) {
    const summary = issues
      .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    super(`Result of ${unitName} (${actualType}) does not match the requested type: ${summary}`, {
      code: 'CAST_FAILED',
      severity: ErrorSeverity.Recoverable,
      details: { unitName, actualType, issues }
    });
    this.issues = issues;
    this.actualType = actualType;
  }
}
