import * as path from 'path';
import ts from 'typescript';
import type { CompilerDiagnostic, DiagnosticSeverity } from '@core/types/diagnostics';
import { compilerLogger, type ILogger } from '@core/utils/logger';
import type { GeneratedArtifact } from '@interpreter/artifacts/ArtifactStore';
import { isArchive, joinClasspath, type ClasspathEntry } from '@interpreter/classpath/ClasspathResolver';
import type { WrappedUnit } from '@interpreter/wrap/SourceWrapper';
import { collectDeprecations } from './deprecations';
import { resolveThroughRoots } from './module-resolution';

export interface CompileFlags {
  /** Run the type checker; when false only syntax errors stop emit */
  typeCheck: boolean;
  /** Strict type checking */
  strict: boolean;
  /** Report references to `@deprecated` declarations as warnings */
  deprecationWarnings: boolean;
}

export const DEFAULT_COMPILE_FLAGS: CompileFlags = {
  typeCheck: true,
  strict: true,
  deprecationWarnings: true
};

/**
 * Settings for one compiler run. Both path strings are the joined classpath:
 * the boot part locates the default library, the rest resolves modules.
 */
export interface CompilerSettings {
  bootClasspath: string;
  classpath: string;
  options: ts.CompilerOptions;
}

export type CompilationResult =
  | { ok: true; outputFile: string; warnings: CompilerDiagnostic[] }
  | { ok: false; errors: CompilerDiagnostic[]; warnings: CompilerDiagnostic[] };

/** Entries modules can be resolved from: no boot directory, no archives */
export function moduleRoots(entries: readonly ClasspathEntry[]): string[] {
  return entries
    .filter(entry => entry.source !== 'boot' && !isArchive(entry.path))
    .map(entry => entry.path);
}

export function buildCompilerSettings(
  entries: readonly ClasspathEntry[],
  artifact: GeneratedArtifact,
  flags: CompileFlags = DEFAULT_COMPILE_FLAGS
): CompilerSettings {
  const classpath = joinClasspath(entries);
  const typeRoots = moduleRoots(entries)
    .map(root => path.join(root, '@types'))
    .filter(root => ts.sys.directoryExists(root));
  const hasNodeTypes = typeRoots.some(root => ts.sys.fileExists(path.join(root, 'node', 'package.json')));

  return {
    bootClasspath: classpath,
    classpath,
    options: {
      target: ts.ScriptTarget.ES2020,
      module: ts.ModuleKind.CommonJS,
      moduleResolution: ts.ModuleResolutionKind.Node10,
      lib: ['lib.es2020.d.ts'],
      strict: flags.strict,
      esModuleInterop: true,
      importHelpers: true,
      noEmitOnError: flags.typeCheck,
      skipLibCheck: true,
      newLine: ts.NewLineKind.LineFeed,
      outDir: artifact.outputDir,
      rootDir: artifact.directory,
      typeRoots,
      types: hasNodeTypes ? ['node'] : []
    }
  };
}

function severityOf(category: ts.DiagnosticCategory): DiagnosticSeverity {
  switch (category) {
    case ts.DiagnosticCategory.Error:
      return 'error';
    case ts.DiagnosticCategory.Warning:
      return 'warning';
    case ts.DiagnosticCategory.Suggestion:
      return 'suggestion';
    default:
      return 'message';
  }
}

/**
 * Convert a compiler diagnostic, mapping positions inside the body back to
 * the caller's source.
 */
export function toCompilerDiagnostic(
  diagnostic: ts.Diagnostic,
  unit: WrappedUnit,
  sourceFile: string
): CompilerDiagnostic {
  const result: CompilerDiagnostic = {
    severity: severityOf(diagnostic.category),
    code: diagnostic.code,
    message: ts.flattenDiagnosticMessageText(diagnostic.messageText, '\n')
  };

  if (!diagnostic.file || diagnostic.start === undefined) {
    return result;
  }

  const { line, character } = diagnostic.file.getLineAndCharacterOfPosition(diagnostic.start);
  result.file = diagnostic.file.fileName;
  result.line = line + 1;
  result.column = character + 1;

  if (path.resolve(diagnostic.file.fileName) !== path.resolve(sourceFile)) {
    return result;
  }

  const hoisted = unit.hoistedLines[line];
  if (hoisted) {
    result.sourceLine = hoisted.sourceLine + 1;
    result.sourceColumn = character + hoisted.characterOffset + 1;
    return result;
  }

  const sourceLine = line - unit.bodyLineOffset;
  if (
    sourceLine >= 0 &&
    sourceLine < unit.sourceLineCount
  ) {
    const inserted = unit.implicitReturnAt;
    const shift = inserted && inserted.line === sourceLine && character >= inserted.character + 'return ('.length
      ? 'return ('.length
      : 0;
    result.sourceLine = sourceLine + 1;
    result.sourceColumn = character - shift + 1;
  }
  return result;
}

/**
 * Configures and runs the TypeScript compiler over exactly one generated
 * source file.
 */
export class CompilerInvoker {
  private readonly flags: CompileFlags;
  private readonly logger: ILogger;

  constructor(flags: Partial<CompileFlags> = {}, logger: ILogger = compilerLogger) {
    this.flags = { ...DEFAULT_COMPILE_FLAGS, ...flags };
    this.logger = logger;
  }

  createHost(settings: CompilerSettings, entries: readonly ClasspathEntry[]): ts.CompilerHost {
    const base = ts.createCompilerHost(settings.options);
    const bootDir = entries.find(entry => entry.source === 'boot')?.path ?? base.getDefaultLibLocation?.();
    const roots = moduleRoots(entries);

    const host: ts.CompilerHost = {
      ...base,
      resolveModuleNameLiterals: (literals, containingFile, _redirected, options) =>
        literals.map(literal => resolveThroughRoots(literal.text, containingFile, roots, options, base))
    };

    if (bootDir) {
      host.getDefaultLibLocation = () => bootDir;
      host.getDefaultLibFileName = options => path.join(bootDir, ts.getDefaultLibFileName(options));
    }
    return host;
  }

  compile(unit: WrappedUnit, artifact: GeneratedArtifact, entries: readonly ClasspathEntry[]): CompilationResult {
    const startTime = Date.now();
    const settings = buildCompilerSettings(entries, artifact, this.flags);
    const host = this.createHost(settings, entries);
    const program = ts.createProgram({
      rootNames: [artifact.sourceFile],
      options: settings.options,
      host
    });

    const sourceFile = program.getSourceFile(artifact.sourceFile);
    if (!sourceFile) {
      return {
        ok: false,
        errors: [{ severity: 'error', code: 0, message: `Generated source ${artifact.sourceFile} could not be read` }],
        warnings: []
      };
    }

    const preEmit: ts.Diagnostic[] = this.flags.typeCheck
      ? [...ts.getPreEmitDiagnostics(program, sourceFile)]
      : [...program.getOptionsDiagnostics(), ...program.getSyntacticDiagnostics(sourceFile)];
    const deprecations = this.flags.deprecationWarnings ? collectDeprecations(program, sourceFile) : [];
    const emitted = program.emit(sourceFile);

    const diagnostics = [...preEmit, ...emitted.diagnostics, ...deprecations]
      .map(diagnostic => toCompilerDiagnostic(diagnostic, unit, artifact.sourceFile));
    const errors = diagnostics.filter(diagnostic => diagnostic.severity === 'error');
    const warnings = diagnostics.filter(diagnostic => diagnostic.severity !== 'error');

    for (const warning of warnings) {
      this.logger.warn(`${unit.unitName}: ${warning.message}`, { code: warning.code, line: warning.sourceLine });
    }

    if (errors.length === 0 && emitted.emitSkipped) {
      errors.push({ severity: 'error', code: 0, message: `Compiler skipped emit for ${unit.unitName}` });
    }

    this.logger.debug('Compiled unit', {
      unitName: unit.unitName,
      errors: errors.length,
      warnings: warnings.length,
      duration: Date.now() - startTime
    });

    if (errors.length > 0) {
      return { ok: false, errors, warnings };
    }
    return { ok: true, outputFile: artifact.outputFile, warnings };
  }
}
