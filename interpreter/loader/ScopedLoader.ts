import * as vm from 'vm';
import * as path from 'path';
import Module from 'module';
import { LoadError } from '@core/errors';
import type { IsolationMode } from '@core/config/types';
import { loaderLogger, type ILogger } from '@core/utils/logger';
import type { IFileSystemService } from '@services/fs/IFileSystemService';

/** A loaded unit's class: constructible with no arguments */
export type UnitConstructor = new () => unknown;

/** An instantiated unit, ready to produce its value */
export interface LoadedEvaluator {
  produce(): unknown;
}

export interface ScopedLoaderOptions {
  outputDir: string;
  /** Parent search paths, consulted after the output directory */
  searchPaths: readonly string[];
  fileSystem: IFileSystemService;
  isolation?: IsolationMode;
  logger?: ILogger;
}

const COMMONJS_PARAMETERS = ['exports', 'require', 'module', '__filename', '__dirname'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return (typeof value === 'object' || typeof value === 'function') && value !== null;
}

function isUnitConstructor(value: unknown): value is UnitConstructor {
  return typeof value === 'function';
}

function isLoadedEvaluator(value: unknown): value is LoadedEvaluator {
  return isRecord(value) && typeof value.produce === 'function';
}

/**
 * Loader rooted at one output directory. Modules the unit requires are
 * looked up in the output directory first, then in the parent search paths,
 * which the caller derives from the process classpath.
 */
export class ScopedLoader {
  private readonly outputDir: string;
  private readonly searchPaths: readonly string[];
  private readonly fileSystem: IFileSystemService;
  private readonly isolation: IsolationMode;
  private readonly logger: ILogger;

  constructor(options: ScopedLoaderOptions) {
    this.outputDir = path.resolve(options.outputDir);
    this.searchPaths = options.searchPaths;
    this.fileSystem = options.fileSystem;
    this.isolation = options.isolation ?? 'host';
    this.logger = options.logger ?? loaderLogger;
  }

  /**
   * Create a module whose require() resolves relative to the output
   * directory and searches `[outputDir, ...searchPaths]` for bare specifiers.
   */
  createModule(filename: string): Module {
    const scoped = new Module(filename);
    scoped.filename = filename;
    scoped.paths = [this.outputDir, ...this.searchPaths.filter(entry => entry !== this.outputDir)];
    return scoped;
  }

  /**
   * Globals for an isolated context. The unit gets its own intrinsics but
   * shares the host's process, console and timers.
   */
  private createContext(): vm.Context {
    return vm.createContext({
      console,
      process,
      Buffer,
      URL,
      URLSearchParams,
      TextEncoder,
      TextDecoder,
      setTimeout,
      setInterval,
      setImmediate,
      clearTimeout,
      clearInterval,
      clearImmediate,
      queueMicrotask,
      structuredClone
    });
  }

  /**
   * Run the emitted module for `unitName` and return its exported class.
   */
  async loadUnit(unitName: string): Promise<UnitConstructor> {
    const filename = path.join(this.outputDir, `${unitName}.js`);

    let code: string;
    try {
      code = await this.fileSystem.readFile(filename);
    } catch (error) {
      throw new LoadError(`Compiled output for ${unitName} was not found at ${filename}`, {
        reason: 'not-found',
        unitName,
        outputFile: filename,
        cause: error
      });
    }

    const scoped = this.createModule(filename);
    try {
      const moduleFunction = vm.compileFunction(code, COMMONJS_PARAMETERS, {
        filename,
        ...(this.isolation === 'isolated' ? { parsingContext: this.createContext() } : {})
      });
      moduleFunction.call(scoped.exports, scoped.exports, scoped.require.bind(scoped), scoped, filename, this.outputDir);
      scoped.loaded = true;
    } catch (error) {
      throw new LoadError(`Compiled module for ${unitName} failed to load`, {
        reason: 'module-failed',
        unitName,
        outputFile: filename,
        cause: error
      });
    }

    const exported: unknown = scoped.exports;
    const unitClass = isRecord(exported) ? exported[unitName] : undefined;
    if (!isUnitConstructor(unitClass)) {
      throw new LoadError(`Compiled module does not export a class named ${unitName}`, {
        reason: 'not-found',
        unitName,
        outputFile: filename
      });
    }

    this.logger.debug('Loaded unit', { unitName, isolation: this.isolation });
    return unitClass;
  }

  /**
   * Construct the unit with no arguments and check it can produce a value.
   */
  instantiate(unitClass: UnitConstructor, unitName: string): LoadedEvaluator {
    if (unitClass.length !== 0) {
      throw new LoadError(`${unitName} has no zero-argument constructor`, {
        reason: 'not-constructible',
        unitName
      });
    }

    let instance: unknown;
    try {
      instance = Reflect.construct(unitClass, []);
    } catch (error) {
      throw new LoadError(`${unitName} could not be constructed`, {
        reason: 'not-constructible',
        unitName,
        cause: error
      });
    }

    if (!isLoadedEvaluator(instance)) {
      throw new LoadError(`${unitName} has no produce() method`, {
        reason: 'not-invocable',
        unitName
      });
    }
    return instance;
  }
}
