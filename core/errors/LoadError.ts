import { EvalError, ErrorSeverity } from './EvalError';

/**
 * Why a compiled unit could not be turned into an invocable instance.
 * - not-found: the emitted file or the named export is missing
 * - module-failed: the emitted module threw while loading
 * - not-constructible: no usable zero-argument constructor
 * - not-invocable: the instance has no produce() method
 */
export type LoadFailureReason = 'not-found' | 'module-failed' | 'not-constructible' | 'not-invocable';

export class LoadError extends EvalError {
  public readonly reason: LoadFailureReason;
  public readonly unitName: string;

  constructor(
    message: string,
    options: { reason: LoadFailureReason; unitName: string; outputFile?: string; cause?: unknown }
  ) {
    super(message, {
      code: 'LOAD_FAILED',
      severity: ErrorSeverity.Recoverable,
      details: { reason: options.reason, unitName: options.unitName, outputFile: options.outputFile },
      cause: options.cause
    });
    this.reason = options.reason;
    this.unitName = options.unitName;
  }
}
