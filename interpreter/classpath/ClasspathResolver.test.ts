import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { strToU8, zipSync } from 'fflate';
import { ClasspathResolutionError } from '@core/errors';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';
import { ClasspathResolver, isArchive, joinClasspath, toPlainPath } from './ClasspathResolver';

const toolchain = () => ({ compiler: '/toolchain/compiler', runtimeLibrary: '/toolchain/runtime' });

describe('ClasspathResolver', () => {
  let workDir: string;
  let fileSystem: NodeFileSystem;

  function writeArchive(name: string, files: Record<string, string>): string {
    const archive = path.join(workDir, name);
    const entries: Record<string, Uint8Array> = {};
    for (const [file, content] of Object.entries(files)) {
      entries[file] = strToU8(content);
    }
    fs.mkdirSync(path.dirname(archive), { recursive: true });
    fs.writeFileSync(archive, zipSync(entries));
    return archive;
  }

  function resolver(classpath: string[]): ClasspathResolver {
    return new ClasspathResolver({
      fileSystem,
      classpath,
      bootClasspath: '/boot/lib',
      includeHostPaths: false,
      toolchain
    });
  }

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'evalconf-classpath-'));
    fileSystem = new NodeFileSystem();
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  describe('resolve', () => {
    it('should order boot, process with manifest entries, then toolchain', async () => {
      const nested = writeArchive('lib/nested.zip', {
        'package.json': JSON.stringify({ classPath: 'never-expanded' })
      });
      const archive = writeArchive('app.zip', {
        'package.json': JSON.stringify({ classPath: 'lib/nested.zip  shared' }),
        'index.js': 'module.exports = 1;'
      });
      const modulesDir = path.join(workDir, 'modules');
      fs.mkdirSync(modulesDir);

      const entries = await resolver([archive, modulesDir]).resolve();

      expect(entries).toEqual([
        { path: '/boot/lib', source: 'boot' },
        { path: archive, source: 'process' },
        { path: nested, source: 'manifest', declaredBy: archive },
        { path: path.join(workDir, 'shared'), source: 'manifest', declaredBy: archive },
        { path: modulesDir, source: 'process' },
        { path: '/toolchain/compiler', source: 'toolchain' },
        { path: '/toolchain/runtime', source: 'toolchain' }
      ]);
    });

    it('should split a multi-entry boot classpath', async () => {
      const entries = await new ClasspathResolver({
        fileSystem,
        bootClasspath: ['/boot/a', '/boot/b'].join(path.delimiter),
        includeHostPaths: false,
        toolchain
      }).resolve();

      expect(entries.filter(entry => entry.source === 'boot').map(entry => entry.path)).toEqual(['/boot/a', '/boot/b']);
    });

    it('should accept file URLs', async () => {
      const modulesDir = path.join(workDir, 'modules');
      const entries = await resolver([pathToFileURL(modulesDir).href]).resolve();

      expect(entries[1]).toEqual({ path: modulesDir, source: 'process' });
    });

    it('should append the host lookup paths after configured entries', async () => {
      const entries = await new ClasspathResolver({
        fileSystem,
        classpath: ['/configured'],
        bootClasspath: '/boot/lib',
        baseDir: workDir,
        toolchain
      }).resolve();

      const processPaths = entries.filter(entry => entry.source === 'process').map(entry => entry.path);
      expect(processPaths[0]).toBe('/configured');
      expect(processPaths[1]).toBe(path.join(workDir, 'node_modules'));
    });

    it('should use the compiler library directory when no boot classpath is given', async () => {
      const entries = await new ClasspathResolver({ fileSystem, includeHostPaths: false, toolchain }).resolve();

      expect(entries[0].source).toBe('boot');
      expect(fs.existsSync(path.join(entries[0].path, 'lib.es2020.d.ts'))).toBe(true);
    });
  });

  describe('readManifestClasspath', () => {
    it('should accept a list of entries', async () => {
      const archive = writeArchive('list.zip', {
        'package.json': JSON.stringify({ classPath: ['vendor', '/opt/shared'] })
      });

      await expect(resolver([]).readManifestClasspath(archive)).resolves.toEqual([
        path.join(workDir, 'vendor'),
        '/opt/shared'
      ]);
    });

    it('should return nothing for an archive without a manifest', async () => {
      const archive = writeArchive('plain.zip', { 'index.js': '' });
      await expect(resolver([]).readManifestClasspath(archive)).resolves.toEqual([]);
    });

    it('should return nothing for a manifest without the attribute', async () => {
      const archive = writeArchive('bare.zip', { 'package.json': JSON.stringify({ name: 'bare' }) });
      await expect(resolver([]).readManifestClasspath(archive)).resolves.toEqual([]);
    });

    it('should not open directories or non-archives', async () => {
      const dirNamedLikeArchive = path.join(workDir, 'folder.zip');
      fs.mkdirSync(dirNamedLikeArchive);

      await expect(resolver([]).readManifestClasspath(dirNamedLikeArchive)).resolves.toEqual([]);
      await expect(resolver([]).readManifestClasspath(path.join(workDir, 'missing-dir'))).resolves.toEqual([]);
    });

    it('should name a missing archive', async () => {
      const missing = path.join(workDir, 'missing.zip');

      await expect(resolver([]).readManifestClasspath(missing)).rejects.toThrow(
        `Cannot open classpath archive: ${missing}`
      );
    });

    it('should name an archive that is not a zip file', async () => {
      const corrupt = path.join(workDir, 'corrupt.zip');
      fs.writeFileSync(corrupt, 'not an archive');

      const error = await resolver([]).readManifestClasspath(corrupt).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(ClasspathResolutionError);
      if (error instanceof ClasspathResolutionError) {
        expect(error.entry).toBe(corrupt);
        expect(error.message).toBe(`Cannot read classpath archive: ${corrupt}`);
      }
    });

    it('should name an archive whose manifest is not JSON', async () => {
      const archive = writeArchive('broken.zip', { 'package.json': '{ classPath:' });

      await expect(resolver([]).readManifestClasspath(archive)).rejects.toThrow(
        `Archive manifest is not valid JSON: ${archive}`
      );
    });

    it('should reject a manifest attribute of the wrong type', async () => {
      const archive = writeArchive('typed.zip', { 'package.json': JSON.stringify({ classPath: 42 }) });

      await expect(resolver([archive]).resolve()).rejects.toBeInstanceOf(ClasspathResolutionError);
    });
  });
});

describe('classpath helpers', () => {
  it('should recognise archives by extension', () => {
    expect(isArchive('/libs/app.zip')).toBe(true);
    expect(isArchive('/libs/APP.ZIP')).toBe(true);
    expect(isArchive('/libs/node_modules')).toBe(false);
  });

  it('should join entries with the platform delimiter', () => {
    expect(joinClasspath([
      { path: '/a', source: 'boot' },
      { path: '/b', source: 'process' }
    ])).toBe(`/a${path.delimiter}/b`);
  });

  it('should convert file URLs to paths', () => {
    expect(toPlainPath('file:///opt/libs/app.zip')).toBe('/opt/libs/app.zip');
    expect(toPlainPath('/opt/libs')).toBe('/opt/libs');
  });
});
