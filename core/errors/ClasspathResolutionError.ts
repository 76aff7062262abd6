import { EvalError, ErrorSeverity } from './EvalError';

/**
 * Error thrown when a classpath entry cannot be opened or its manifest
 * cannot be read. The offending entry is always identified.
 */
export class ClasspathResolutionError extends EvalError {
  public readonly entry: string;

  constructor(message: string, entry: string, cause?: unknown) {
    super(`${message}: ${entry}`, {
      code: 'CLASSPATH_RESOLUTION_FAILED',
      severity: ErrorSeverity.Fatal,
      details: { entry },
      cause
    });
    this.entry = entry;
  }
}
