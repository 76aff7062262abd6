import { EvalError, ErrorSeverity } from './EvalError';
import { formatDiagnostics, type CompilerDiagnostic } from '@core/types/diagnostics';

export class CompilationError extends EvalError {
  /** Every error-severity diagnostic reported by the compiler */
  public readonly diagnostics: readonly CompilerDiagnostic[];
  /** Warnings reported alongside the errors */
  public readonly warnings: readonly CompilerDiagnostic[];
  public readonly unitName: string;

  constructor(
    unitName: string,
    diagnostics: readonly CompilerDiagnostic[],
    warnings: readonly CompilerDiagnostic[] = []
  ) {
    const count = diagnostics.length;
    super(
      `Compilation of ${unitName} failed with ${count} error${count === 1 ? '' : 's'}:\n${formatDiagnostics(diagnostics)}`,
      {
        code: 'COMPILATION_FAILED',
        severity: ErrorSeverity.Recoverable,
        details: { unitName, diagnostics, warnings }
      }
    );
    this.unitName = unitName;
    this.diagnostics = diagnostics;
    this.warnings = warnings;
  }
}
