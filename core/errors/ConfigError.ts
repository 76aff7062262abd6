import { EvalError, ErrorSeverity } from './EvalError';

export class ConfigError extends EvalError {
  public readonly filePath?: string;

  constructor(message: string, options: { filePath?: string; cause?: unknown } = {}) {
    super(message, {
      code: 'CONFIG_INVALID',
      severity: ErrorSeverity.Fatal,
      details: { filePath: options.filePath },
      cause: options.cause
    });
    this.filePath = options.filePath;
  }
}
