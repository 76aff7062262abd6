/**
 * evalconf API Entry Point
 *
 * Evaluate TypeScript files as application configuration. A configuration
 * file is ordinary code whose last expression is the value:
 *
 * ```typescript
 * // config/development.ts
 * import type { AppConfig } from 'my-app/config';
 *
 * const base = { port: 8080 };
 * ({ ...base, timeoutMs: 2 * 1000 }) satisfies AppConfig
 * ```
 *
 * ```typescript
 * const config = await evaluateFile('config/development.ts', AppConfigSchema);
 * ```
 *
 * Evaluated code runs with the privileges of the host process and sees
 * every module the host can resolve. It is not a sandbox.
 */
import type { z, ZodTypeAny } from 'zod';
import { Evaluator, type EvaluatorOptions } from '@interpreter/Evaluator';

export { Evaluator, describeType } from '@interpreter/Evaluator';
export type { EvaluatorOptions, EvaluationOutcome, SourceUnit } from '@interpreter/Evaluator';
export { ArtifactStore } from '@interpreter/artifacts/ArtifactStore';
export type { GeneratedArtifact } from '@interpreter/artifacts/ArtifactStore';
export { ClasspathResolver, joinClasspath } from '@interpreter/classpath/ClasspathResolver';
export type { ClasspathEntry, ClasspathEntrySource } from '@interpreter/classpath/ClasspathResolver';
export { toolchainLocations } from '@interpreter/classpath/toolchain';
export type { ToolchainLocations } from '@interpreter/classpath/toolchain';
export { CompilerInvoker, buildCompilerSettings } from '@interpreter/compiler/CompilerInvoker';
export type { CompilationResult, CompilerSettings, CompileFlags } from '@interpreter/compiler/CompilerInvoker';
export { ScopedLoader } from '@interpreter/loader/ScopedLoader';
export type { LoadedEvaluator, UnitConstructor } from '@interpreter/loader/ScopedLoader';
export { wrapSource } from '@interpreter/wrap/SourceWrapper';
export type { WrappedUnit } from '@interpreter/wrap/SourceWrapper';
export { ConfigLoader, resolveSettings } from '@core/config/loader';
export type * from '@core/config/types';
export type { CompilerDiagnostic, DiagnosticSeverity } from '@core/types/diagnostics';
export { formatDiagnostic, formatDiagnostics } from '@core/types/diagnostics';
export * from '@core/errors';
export type { IFileSystemService } from '@services/fs/IFileSystemService';
export { NodeFileSystem } from '@services/fs/NodeFileSystem';

let defaultEvaluator: Evaluator | undefined;

function getDefaultEvaluator(): Evaluator {
  if (!defaultEvaluator) {
    defaultEvaluator = new Evaluator();
  }
  return defaultEvaluator;
}

/**
 * Evaluate source text with the default evaluator.
 *
 * @example
 * ```typescript
 * await evaluate('1 + 1', z.number()); // => 2
 * ```
 */
export function evaluate<S extends ZodTypeAny>(source: string, schema: S): Promise<z.output<S>> {
  return getDefaultEvaluator().evaluate(source, schema);
}

/**
 * Evaluate a source file with the default evaluator.
 */
export function evaluateFile<S extends ZodTypeAny>(filePath: string, schema: S): Promise<z.output<S>> {
  return getDefaultEvaluator().evaluateFile(filePath, schema);
}

/**
 * Evaluator with explicit options, for callers that do not want the
 * process-wide default.
 */
export function createEvaluator(options?: EvaluatorOptions): Evaluator {
  return new Evaluator(options);
}
