import * as path from 'path';
import { randomBytes } from 'crypto';
import ts from 'typescript';
import { ArtifactCollisionError, WrapError } from '@core/errors';
import type { OutputRetention, UnitNaming } from '@core/config/types';
import { artifactsLogger, type ILogger } from '@core/utils/logger';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { cancelDeleteOnExit, deleteOnExit } from './exit-cleanup';

/**
 * One call's generated files: the wrapped source, and the directory the
 * compiler writes the loadable module into.
 */
export interface GeneratedArtifact {
  /** Identifier unique within the process (equal to unitName under fixed naming) */
  readonly id: string;
  readonly unitName: string;
  /** Artifact directory holding the source file and the output directory */
  readonly directory: string;
  readonly sourceFile: string;
  readonly outputDir: string;
  /** Emitted CommonJS module */
  readonly outputFile: string;
}

export interface ArtifactStoreOptions {
  rootDir: string;
  fileSystem: IFileSystemService;
  naming?: UnitNaming;
  unitPrefix?: string;
  logger?: ILogger;
}

let sequence = 0;

/** Artifacts in flight across every store in the process, keyed by source file */
const inFlight = new Map<string, GeneratedArtifact>();

function nextUnitName(prefix: string): string {
  sequence += 1;
  return `${prefix}_${process.pid}_${sequence}_${randomBytes(4).toString('hex')}`;
}

/**
 * Creates and tracks the temporary files of generated units.
 */
export class ArtifactStore {
  private readonly rootDir: string;
  private readonly fileSystem: IFileSystemService;
  private readonly naming: UnitNaming;
  private readonly unitPrefix: string;
  private readonly logger: ILogger;

  constructor(options: ArtifactStoreOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.fileSystem = options.fileSystem;
    this.naming = options.naming ?? 'unique';
    this.unitPrefix = options.unitPrefix ?? 'Evaluator';
    this.logger = options.logger ?? artifactsLogger;

    if (!ts.isIdentifierText(this.unitPrefix, ts.ScriptTarget.ES2020)) {
      throw new WrapError(`Unit prefix "${this.unitPrefix}" is not a valid identifier`, {
        code: 'INVALID_UNIT_NAME',
        details: { unitName: this.unitPrefix }
      });
    }
  }

  /**
   * Reserve paths for a new unit. Synchronous, so concurrent callers register
   * before either of them touches the disk.
   */
  allocate(): GeneratedArtifact {
    const unitName = this.naming === 'unique' ? nextUnitName(this.unitPrefix) : this.unitPrefix;
    const directory = path.join(this.rootDir, unitName);
    const outputDir = path.join(directory, 'out');
    const artifact: GeneratedArtifact = {
      id: unitName,
      unitName,
      directory,
      sourceFile: path.join(directory, `${unitName}.ts`),
      outputDir,
      outputFile: path.join(outputDir, `${unitName}.js`)
    };

    const existing = inFlight.get(artifact.sourceFile);
    if (existing) {
      throw new ArtifactCollisionError(existing.unitName, existing.sourceFile);
    }

    inFlight.set(artifact.sourceFile, artifact);
    this.logger.debug('Allocated artifact', { unitName, directory });
    return artifact;
  }

  /**
   * Write the wrapped source and schedule it for removal at process exit.
   */
  async writeSource(artifact: GeneratedArtifact, text: string): Promise<void> {
    try {
      await this.fileSystem.mkdir(artifact.outputDir);
      await this.fileSystem.writeFile(artifact.sourceFile, text);
    } catch (error) {
      throw new WrapError(`Could not write generated source for ${artifact.unitName}`, {
        details: { unitName: artifact.unitName, filePath: artifact.sourceFile },
        cause: error
      });
    }
    deleteOnExit(artifact.sourceFile);
  }

  /**
   * End the artifact's lifetime. Under `delete` the whole artifact directory
   * goes; under `retain` the compiled output stays for inspection.
   */
  async release(artifact: GeneratedArtifact, retention: OutputRetention): Promise<void> {
    if (inFlight.get(artifact.sourceFile) === artifact) {
      inFlight.delete(artifact.sourceFile);
    }

    if (retention === 'delete') {
      await this.fileSystem.remove(artifact.directory);
      cancelDeleteOnExit(artifact.sourceFile);
      this.logger.debug('Deleted artifact', { unitName: artifact.unitName });
    }
  }

  /** In-flight artifacts under this store's root directory */
  inFlightArtifacts(): readonly GeneratedArtifact[] {
    return [...inFlight.values()].filter(artifact => path.dirname(artifact.directory) === this.rootDir);
  }
}
