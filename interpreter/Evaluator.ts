import * as path from 'path';
import type { z, ZodTypeAny } from 'zod';
import { CastError, CompilationError, EvaluationError, WrapError } from '@core/errors';
import { ConfigLoader, readEnvConfig, resolveSettings } from '@core/config/loader';
import type { EvalConfig, EvaluatorSettings } from '@core/config/types';
import type { CompilerDiagnostic } from '@core/types/diagnostics';
import { evaluatorLogger, type ILogger } from '@core/utils/logger';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';
import { ArtifactStore, type GeneratedArtifact } from './artifacts/ArtifactStore';
import { ClasspathResolver, type ClasspathEntry } from './classpath/ClasspathResolver';
import { CompilerInvoker, moduleRoots } from './compiler/CompilerInvoker';
import { ScopedLoader } from './loader/ScopedLoader';
import { wrapSource } from './wrap/SourceWrapper';

/** Source to evaluate: raw text, or a file read once at the start of the call */
export type SourceUnit =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'file'; readonly path: string };

export interface EvaluationOutcome<T> {
  value: T;
  artifact: GeneratedArtifact;
  warnings: CompilerDiagnostic[];
  classpath: ClasspathEntry[];
}

export interface EvaluatorOptions extends EvalConfig {
  fileSystem?: IFileSystemService;
  /**
   * Configuration loaded from evalconf files. Defaults to the files of the
   * current project; pass `{}` to ignore them.
   */
  config?: EvalConfig;
  /** Directory host module lookup starts from; defaults to cwd */
  baseDir?: string;
  /** Include the host's node_modules chain in the classpath (default true) */
  includeHostPaths?: boolean;
  /** Receives compiler warnings for each successful compilation */
  onDiagnostics?: (warnings: readonly CompilerDiagnostic[], artifact: GeneratedArtifact) => void;
  logger?: ILogger;
}

/** Runtime type name used in cast failures */
export function describeType(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  if (typeof value === 'object') {
    const name = Object.getPrototypeOf(value)?.constructor?.name;
    return typeof name === 'string' && name.length > 0 && name !== 'Object' ? name : 'object';
  }
  return typeof value;
}

function pickConfig(options: EvaluatorOptions): EvalConfig {
  return {
    tmpDir: options.tmpDir,
    outputRetention: options.outputRetention,
    naming: options.naming,
    unitPrefix: options.unitPrefix,
    classpath: options.classpath,
    typeCheck: options.typeCheck,
    strict: options.strict,
    deprecationWarnings: options.deprecationWarnings,
    isolation: options.isolation,
    evaluationErrors: options.evaluationErrors
  };
}

/**
 * Evaluates TypeScript source as a value: wrap, compile, load, instantiate,
 * produce, check against the caller's schema.
 *
 * @example
 * ```typescript
 * const evaluator = new Evaluator();
 * const port = await evaluator.evaluate('8000 + 80', z.number());
 * const config = await evaluator.evaluateFile('config/development.ts', AppConfigSchema);
 * ```
 */
export class Evaluator {
  readonly settings: EvaluatorSettings;
  private readonly fileSystem: IFileSystemService;
  private readonly store: ArtifactStore;
  private readonly classpathResolver: ClasspathResolver;
  private readonly compiler: CompilerInvoker;
  private readonly onDiagnostics?: EvaluatorOptions['onDiagnostics'];
  private readonly logger: ILogger;

  constructor(options: EvaluatorOptions = {}) {
    const fileConfig = options.config ?? new ConfigLoader(options.baseDir).load();
    this.settings = resolveSettings(fileConfig, readEnvConfig(), pickConfig(options));
    this.fileSystem = options.fileSystem ?? new NodeFileSystem();
    this.logger = options.logger ?? evaluatorLogger;
    this.onDiagnostics = options.onDiagnostics;

    this.store = new ArtifactStore({
      rootDir: this.settings.tmpDir,
      fileSystem: this.fileSystem,
      naming: this.settings.naming,
      unitPrefix: this.settings.unitPrefix
    });
    this.classpathResolver = new ClasspathResolver({
      fileSystem: this.fileSystem,
      classpath: this.settings.classpath,
      baseDir: options.baseDir,
      includeHostPaths: options.includeHostPaths
    });
    this.compiler = new CompilerInvoker({
      typeCheck: this.settings.typeCheck,
      strict: this.settings.strict,
      deprecationWarnings: this.settings.deprecationWarnings
    });
  }

  /**
   * evaluate('1 + 1', z.number()) // => 2
   */
  async evaluate<S extends ZodTypeAny>(source: string, schema: S): Promise<z.output<S>> {
    const outcome = await this.evaluateDetailed({ kind: 'text', text: source }, schema);
    return outcome.value;
  }

  /**
   * evaluateFile('config/production.ts', AppConfigSchema)
   */
  async evaluateFile<S extends ZodTypeAny>(filePath: string, schema: S): Promise<z.output<S>> {
    const outcome = await this.evaluateDetailed({ kind: 'file', path: filePath }, schema);
    return outcome.value;
  }

  async evaluateDetailed<S extends ZodTypeAny>(
    input: SourceUnit,
    schema: S
  ): Promise<EvaluationOutcome<z.output<S>>> {
    if (input.kind === 'text') {
      return this.run(input.text, schema);
    }
    return this.run(await this.readSource(input.path), schema);
  }

  private async readSource(filePath: string): Promise<string> {
    const resolved = path.resolve(filePath);
    try {
      return await this.fileSystem.readFile(resolved);
    } catch (error) {
      throw new WrapError(`Could not read source file ${resolved}`, {
        code: 'SOURCE_READ_FAILED',
        details: { filePath: resolved },
        cause: error
      });
    }
  }

  private async run<S extends ZodTypeAny>(source: string, schema: S): Promise<EvaluationOutcome<z.output<S>>> {
    // Allocation is synchronous so concurrent calls claim their paths in call order.
    const artifact = this.store.allocate();

    let outcome: EvaluationOutcome<z.output<S>>;
    try {
      outcome = await this.pipeline(source, schema, artifact);
    } catch (error) {
      await this.releaseAfterFailure(artifact);
      throw error;
    }
    await this.store.release(artifact, this.settings.outputRetention);
    return outcome;
  }

  private async pipeline<S extends ZodTypeAny>(
    source: string,
    schema: S,
    artifact: GeneratedArtifact
  ): Promise<EvaluationOutcome<z.output<S>>> {
    const startTime = Date.now();
    const unit = wrapSource(source, artifact.unitName);
    await this.store.writeSource(artifact, unit.text);

    const classpath = await this.classpathResolver.resolve();
    const compiled = this.compiler.compile(unit, artifact, classpath);
    if (!compiled.ok) {
      throw new CompilationError(artifact.unitName, compiled.errors, compiled.warnings);
    }
    if (compiled.warnings.length > 0) {
      this.onDiagnostics?.(compiled.warnings, artifact);
    }

    const loader = new ScopedLoader({
      outputDir: artifact.outputDir,
      searchPaths: moduleRoots(classpath),
      fileSystem: this.fileSystem,
      isolation: this.settings.isolation
    });
    const unitClass = await loader.loadUnit(artifact.unitName);
    const instance = loader.instantiate(unitClass, artifact.unitName);

    const produced = await this.produce(instance.produce.bind(instance), artifact.unitName);

    const parsed = schema.safeParse(produced);
    if (!parsed.success) {
      throw new CastError(artifact.unitName, describeType(produced), parsed.error.issues);
    }

    this.logger.debug('Evaluated unit', {
      unitName: artifact.unitName,
      duration: Date.now() - startTime
    });
    return {
      value: parsed.data,
      artifact,
      warnings: compiled.warnings,
      classpath
    };
  }

  /**
   * Release after a failed evaluation. A release failure is logged so the
   * pipeline's own error reaches the caller.
   */
  private async releaseAfterFailure(artifact: GeneratedArtifact): Promise<void> {
    try {
      await this.store.release(artifact, this.settings.outputRetention);
    } catch (releaseError) {
      this.logger.warn('Could not release artifact after a failed evaluation', {
        unitName: artifact.unitName,
        directory: artifact.directory,
        error: releaseError instanceof Error ? releaseError.message : String(releaseError)
      });
    }
  }

  /**
   * Invoke the unit. Exceptions from the evaluated code are the caller's own
   * and propagate unchanged unless wrapping is configured.
   */
  private async produce(produce: () => unknown, unitName: string): Promise<unknown> {
    try {
      return await produce();
    } catch (error) {
      if (this.settings.evaluationErrors === 'wrap') {
        throw new EvaluationError(unitName, error);
      }
      throw error;
    }
  }
}
