import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ArtifactCollisionError, WrapError } from '@core/errors';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';
import type { IFileSystemService } from '@services/fs/IFileSystemService';
import { ArtifactStore } from './ArtifactStore';
import { pendingExitDeletions } from './exit-cleanup';

describe('ArtifactStore', () => {
  let rootDir: string;
  let fileSystem: NodeFileSystem;

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'evalconf-artifacts-'));
    fileSystem = new NodeFileSystem();
  });

  afterEach(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  describe('allocate', () => {
    it('should lay out the artifact under the root directory', () => {
      const store = new ArtifactStore({ rootDir, fileSystem });
      const artifact = store.allocate();

      expect(artifact.unitName).toMatch(/^Evaluator_\d+_\d+_[0-9a-f]{8}$/);
      expect(artifact.id).toBe(artifact.unitName);
      expect(artifact.directory).toBe(path.join(rootDir, artifact.unitName));
      expect(artifact.sourceFile).toBe(path.join(rootDir, artifact.unitName, `${artifact.unitName}.ts`));
      expect(artifact.outputDir).toBe(path.join(rootDir, artifact.unitName, 'out'));
      expect(artifact.outputFile).toBe(path.join(rootDir, artifact.unitName, 'out', `${artifact.unitName}.js`));
    });

    it('should give every allocation its own name under unique naming', () => {
      const store = new ArtifactStore({ rootDir, fileSystem });
      const first = store.allocate();
      const second = store.allocate();

      expect(second.unitName).not.toBe(first.unitName);
      expect(second.directory).not.toBe(first.directory);
      expect(store.inFlightArtifacts()).toEqual([first, second]);
    });

    it('should use the configured prefix', () => {
      const store = new ArtifactStore({ rootDir, fileSystem, unitPrefix: 'Settings' });
      expect(store.allocate().unitName).toMatch(/^Settings_/);
    });

    it('should reject a prefix that is not an identifier', () => {
      expect(() => new ArtifactStore({ rootDir, fileSystem, unitPrefix: '1st' })).toThrow(WrapError);
      expect(() => new ArtifactStore({ rootDir, fileSystem, unitPrefix: 'has-dash' }))
        .toThrow('Unit prefix "has-dash" is not a valid identifier');
    });

    it('should detect a collision under fixed naming', () => {
      const store = new ArtifactStore({ rootDir, fileSystem, naming: 'fixed' });
      const first = store.allocate();

      expect(first.unitName).toBe('Evaluator');
      expect(() => store.allocate()).toThrow(ArtifactCollisionError);
    });

    it('should detect a collision between stores sharing a root directory', () => {
      const first = new ArtifactStore({ rootDir, fileSystem, naming: 'fixed' });
      const second = new ArtifactStore({ rootDir, fileSystem, naming: 'fixed' });
      first.allocate();

      expect(() => second.allocate()).toThrow(ArtifactCollisionError);
      expect(second.inFlightArtifacts()).toHaveLength(1);
    });

    it('should allow the fixed name again once released', async () => {
      const store = new ArtifactStore({ rootDir, fileSystem, naming: 'fixed' });
      await store.release(store.allocate(), 'retain');

      expect(store.allocate().unitName).toBe('Evaluator');
    });
  });

  describe('writeSource', () => {
    it('should write the source and create the output directory', async () => {
      const store = new ArtifactStore({ rootDir, fileSystem });
      const artifact = store.allocate();

      await store.writeSource(artifact, 'export class X {}\n');

      expect(fs.readFileSync(artifact.sourceFile, 'utf8')).toBe('export class X {}\n');
      expect(fs.statSync(artifact.outputDir).isDirectory()).toBe(true);
      expect(pendingExitDeletions()).toContain(artifact.sourceFile);
    });

    it('should raise a WrapError when the file cannot be written', async () => {
      const failing: IFileSystemService = {
        readFile: vi.fn(),
        readBinary: vi.fn(),
        exists: vi.fn(),
        isFile: vi.fn(),
        isDirectory: vi.fn(),
        remove: vi.fn(),
        mkdir: vi.fn().mockResolvedValue(undefined),
        writeFile: vi.fn().mockRejectedValue(new Error('disk full'))
      };
      const store = new ArtifactStore({ rootDir, fileSystem: failing });
      const artifact = store.allocate();

      await expect(store.writeSource(artifact, 'x')).rejects.toMatchObject({
        name: 'WrapError',
        code: 'WRAP_FAILED'
      });
    });
  });

  describe('release', () => {
    it('should keep the files under retain', async () => {
      const store = new ArtifactStore({ rootDir, fileSystem });
      const artifact = store.allocate();
      await store.writeSource(artifact, 'x');

      await store.release(artifact, 'retain');

      expect(fs.existsSync(artifact.sourceFile)).toBe(true);
      expect(store.inFlightArtifacts()).toEqual([]);
    });

    it('should remove the artifact directory under delete', async () => {
      const store = new ArtifactStore({ rootDir, fileSystem });
      const artifact = store.allocate();
      await store.writeSource(artifact, 'x');

      await store.release(artifact, 'delete');

      expect(fs.existsSync(artifact.directory)).toBe(false);
      expect(pendingExitDeletions()).not.toContain(artifact.sourceFile);
    });
  });
});
