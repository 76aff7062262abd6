import * as path from 'path';
import { createRequire } from 'module';
import { fileURLToPath } from 'url';
import ts from 'typescript';
import { strFromU8, unzipSync } from 'fflate';
import { ClasspathResolutionError } from '@core/errors';
import { classpathLogger, type ILogger } from '@core/utils/logger';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { toolchainLocations, type ToolchainLocations } from './toolchain';

/**
 * Where an entry came from:
 * - boot: the compiler's default library directory
 * - process: configured entries and the host's module lookup paths
 * - manifest: listed in an archive's manifest
 * - toolchain: module roots of the compiler and its runtime library
 */
export type ClasspathEntrySource = 'boot' | 'process' | 'manifest' | 'toolchain';

export interface ClasspathEntry {
  readonly path: string;
  readonly source: ClasspathEntrySource;
  /** Archive whose manifest listed this entry */
  readonly declaredBy?: string;
}

export interface ClasspathResolverOptions {
  fileSystem: IFileSystemService;
  /** Configured entries, searched before the host lookup paths */
  classpath?: readonly string[];
  /** Delimiter-joined boot classpath; defaults to the compiler's library directory */
  bootClasspath?: string;
  /** Directory the host lookup paths are computed from; defaults to cwd */
  baseDir?: string;
  /** Include the host's own module lookup paths (default true) */
  includeHostPaths?: boolean;
  toolchain?: () => ToolchainLocations;
  logger?: ILogger;
}

const ARCHIVE_PATTERN = /\.zip$/i;
const MANIFEST_FILE = 'package.json';
const MANIFEST_ATTRIBUTE = 'classPath';

export function isArchive(entry: string): boolean {
  return ARCHIVE_PATTERN.test(entry);
}

export function joinClasspath(entries: readonly ClasspathEntry[]): string {
  return entries.map(entry => entry.path).join(path.delimiter);
}

/** Strip a `file:` scheme; plain paths pass through. */
export function toPlainPath(entry: string): string {
  return entry.startsWith('file:') ? fileURLToPath(entry) : entry;
}

export function defaultBootClasspath(): string {
  return path.dirname(ts.getDefaultLibFilePath({ target: ts.ScriptTarget.ES2020 }));
}

/**
 * The directories Node would search for a bare specifier required from
 * `baseDir`: its node_modules chain followed by the global folders.
 */
export function hostLookupPaths(baseDir: string): string[] {
  const probe = createRequire(path.join(baseDir, '__evalconf_probe__.js'));
  return probe.resolve.paths('__evalconf_probe__') ?? [];
}

/**
 * Computes the ordered classpath a generated unit is compiled and loaded
 * against: boot entries, then process entries each followed by the entries
 * its archive manifest declares, then the toolchain.
 *
 * Manifest expansion is one level deep. Entries contributed by a manifest
 * are never opened, even when they are archives themselves.
 */
export class ClasspathResolver {
  private readonly fileSystem: IFileSystemService;
  private readonly classpath: readonly string[];
  private readonly bootClasspath?: string;
  private readonly baseDir: string;
  private readonly includeHostPaths: boolean;
  private readonly toolchain: () => ToolchainLocations;
  private readonly logger: ILogger;

  constructor(options: ClasspathResolverOptions) {
    this.fileSystem = options.fileSystem;
    this.classpath = options.classpath ?? [];
    this.bootClasspath = options.bootClasspath;
    this.baseDir = options.baseDir ?? process.cwd();
    this.includeHostPaths = options.includeHostPaths ?? true;
    this.toolchain = options.toolchain ?? toolchainLocations;
    this.logger = options.logger ?? classpathLogger;
  }

  async resolve(): Promise<ClasspathEntry[]> {
    const boot = (this.bootClasspath ?? defaultBootClasspath())
      .split(path.delimiter)
      .filter(entry => entry.length > 0)
      .map((entry): ClasspathEntry => ({ path: entry, source: 'boot' }));

    const processPaths = [
      ...this.classpath,
      ...(this.includeHostPaths ? hostLookupPaths(this.baseDir) : [])
    ].map(toPlainPath);

    const expanded: ClasspathEntry[] = [];
    for (const entry of processPaths) {
      expanded.push({ path: entry, source: 'process' });
      for (const nested of await this.readManifestClasspath(entry)) {
        expanded.push({ path: nested, source: 'manifest', declaredBy: entry });
      }
    }

    const { compiler, runtimeLibrary } = this.toolchain();
    const toolchain: ClasspathEntry[] = [
      { path: compiler, source: 'toolchain' },
      { path: runtimeLibrary, source: 'toolchain' }
    ];

    const entries = [...boot, ...expanded, ...toolchain];
    this.logger.debug('Resolved classpath', { entries: entries.length });
    return entries;
  }

  /**
   * Entries listed by an archive's manifest. Directories and other
   * non-archives are not opened and contribute nothing.
   */
  async readManifestClasspath(entry: string): Promise<string[]> {
    if (!isArchive(entry) || await this.fileSystem.isDirectory(entry)) {
      return [];
    }

    let data: Uint8Array;
    try {
      data = await this.fileSystem.readBinary(entry);
    } catch (error) {
      throw new ClasspathResolutionError('Cannot open classpath archive', entry, error);
    }

    let manifestBytes: Uint8Array | undefined;
    try {
      manifestBytes = unzipSync(data, { filter: file => file.name === MANIFEST_FILE })[MANIFEST_FILE];
    } catch (error) {
      throw new ClasspathResolutionError('Cannot read classpath archive', entry, error);
    }

    if (!manifestBytes) {
      return [];
    }

    let manifest: unknown;
    try {
      manifest = JSON.parse(strFromU8(manifestBytes));
    } catch (error) {
      throw new ClasspathResolutionError('Archive manifest is not valid JSON', entry, error);
    }

    const declared = readClassPathAttribute(manifest, entry);
    const archiveDir = path.dirname(entry);
    const nested = declared.map(item => path.resolve(archiveDir, toPlainPath(item)));
    if (nested.length > 0) {
      this.logger.debug('Expanded archive manifest', { archive: entry, entries: nested });
    }
    return nested;
  }
}

function readClassPathAttribute(manifest: unknown, entry: string): string[] {
  if (typeof manifest !== 'object' || manifest === null || !(MANIFEST_ATTRIBUTE in manifest)) {
    return [];
  }

  const value = manifest[MANIFEST_ATTRIBUTE];
  if (typeof value === 'string') {
    return value.split(/\s+/).filter(item => item.length > 0);
  }
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value.filter(item => item.length > 0);
  }
  throw new ClasspathResolutionError(
    `Archive manifest attribute "${MANIFEST_ATTRIBUTE}" must be a string or a list of strings`,
    entry
  );
}
