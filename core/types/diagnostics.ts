/**
 * Severity of a single compiler diagnostic. Mirrors `ts.DiagnosticCategory`
 * without leaking the compiler's enum into the public surface.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'suggestion' | 'message';

export interface CompilerDiagnostic {
  severity: DiagnosticSeverity;
  /** TypeScript diagnostic code, e.g. 2322 */
  code: number;
  message: string;
  /** Generated file the diagnostic points into */
  file?: string;
  /** 1-based position in the generated file */
  line?: number;
  column?: number;
  /** 1-based position in the caller's source, when the diagnostic lies in the evaluated body */
  sourceLine?: number;
  sourceColumn?: number;
}

export function formatDiagnostic(diagnostic: CompilerDiagnostic): string {
  const location = diagnostic.sourceLine !== undefined
    ? `line ${diagnostic.sourceLine}:${diagnostic.sourceColumn ?? 1}`
    : diagnostic.line !== undefined
      ? `generated ${diagnostic.line}:${diagnostic.column ?? 1}`
      : 'unit';
  return `${location} TS${diagnostic.code} ${diagnostic.message}`;
}

export function formatDiagnostics(diagnostics: readonly CompilerDiagnostic[]): string {
  return diagnostics.map(d => `  ${formatDiagnostic(d)}`).join('\n');
}
