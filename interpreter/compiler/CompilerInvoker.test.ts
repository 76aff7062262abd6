import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { NodeFileSystem } from '@services/fs/NodeFileSystem';
import { ArtifactStore, type GeneratedArtifact } from '@interpreter/artifacts/ArtifactStore';
import { ClasspathResolver, joinClasspath, type ClasspathEntry } from '@interpreter/classpath/ClasspathResolver';
import { wrapSource, type WrappedUnit } from '@interpreter/wrap/SourceWrapper';
import { CompilerInvoker, buildCompilerSettings, moduleRoots } from './CompilerInvoker';
import { DEPRECATED_SYMBOL_CODE } from './deprecations';

const DEPRECATED_SOURCE = [
  '/** @deprecated use current() */',
  'function legacy(): number { return 1; }',
  'legacy()'
].join('\n');

describe('CompilerInvoker', () => {
  let rootDir: string;
  let store: ArtifactStore;
  let entries: ClasspathEntry[];

  async function prepare(source: string): Promise<{ unit: WrappedUnit; artifact: GeneratedArtifact }> {
    const artifact = store.allocate();
    const unit = wrapSource(source, artifact.unitName);
    await store.writeSource(artifact, unit.text);
    return { unit, artifact };
  }

  beforeAll(async () => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'evalconf-compiler-'));
    const fileSystem = new NodeFileSystem();
    store = new ArtifactStore({ rootDir, fileSystem });
    entries = await new ClasspathResolver({ fileSystem }).resolve();
  });

  afterAll(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
  });

  it('should emit a loadable module for valid source', async () => {
    const { unit, artifact } = await prepare('1 + 1');

    const result = new CompilerInvoker().compile(unit, artifact, entries);

    expect(result).toEqual({ ok: true, outputFile: artifact.outputFile, warnings: [] });
    const emitted = fs.readFileSync(artifact.outputFile, 'utf8');
    expect(emitted).toContain('return (1 + 1);');
    expect(emitted).toContain(`exports.${artifact.unitName} = ${artifact.unitName};`);
  });

  it('should report type errors at the caller line', async () => {
    const { unit, artifact } = await prepare("const port: number = 'eighty';\nport");

    const result = new CompilerInvoker().compile(unit, artifact, entries);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatchObject({
        severity: 'error',
        code: 2322,
        sourceLine: 1,
        sourceColumn: 7
      });
      expect(result.errors[0].message).toBe("Type 'string' is not assignable to type 'number'.");
    }
    expect(fs.existsSync(artifact.outputFile)).toBe(false);
  });

  it('should map columns past the inserted return back to the caller', async () => {
    const { unit, artifact } = await prepare('const flag = true;\nflag.length');

    const result = new CompilerInvoker().compile(unit, artifact, entries);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors[0]).toMatchObject({ code: 2339, sourceLine: 2, sourceColumn: 6 });
    }
  });

  it('should emit despite type errors when type checking is off', async () => {
    const { unit, artifact } = await prepare("const port: number = 'eighty';\nport");

    const result = new CompilerInvoker({ typeCheck: false }).compile(unit, artifact, entries);

    expect(result.ok).toBe(true);
    expect(fs.existsSync(artifact.outputFile)).toBe(true);
  });

  it('should still stop on syntax errors when type checking is off', async () => {
    const { unit, artifact } = await prepare('const = 1;');

    const result = new CompilerInvoker({ typeCheck: false }).compile(unit, artifact, entries);

    expect(result.ok).toBe(false);
  });

  it('should warn about deprecated declarations', async () => {
    const { unit, artifact } = await prepare(DEPRECATED_SOURCE);

    const result = new CompilerInvoker().compile(unit, artifact, entries);

    expect(result.ok).toBe(true);
    expect(result.warnings).toEqual([
      expect.objectContaining({
        severity: 'warning',
        code: DEPRECATED_SYMBOL_CODE,
        message: "'legacy' is deprecated.",
        sourceLine: 3,
        sourceColumn: 1
      })
    ]);
  });

  it('should skip deprecation warnings when disabled', async () => {
    const { unit, artifact } = await prepare(DEPRECATED_SOURCE);

    const result = new CompilerInvoker({ deprecationWarnings: false }).compile(unit, artifact, entries);

    expect(result.warnings).toEqual([]);
  });

  it('should resolve packages from the classpath', async () => {
    const { unit, artifact } = await prepare("import { z } from 'zod';\nz.number().parse(1)");

    const result = new CompilerInvoker().compile(unit, artifact, entries);

    expect(result.ok).toBe(true);
    expect(fs.readFileSync(artifact.outputFile, 'utf8')).toContain('require("zod")');
  });

  it('should fail to resolve packages missing from the classpath', async () => {
    const { unit, artifact } = await prepare("import { z } from 'zod';\nz.number().parse(1)");
    const bare = entries.filter(entry => entry.source === 'boot');

    const result = new CompilerInvoker().compile(unit, artifact, bare);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors[0]).toMatchObject({ code: 2307, line: 1, sourceLine: 1, sourceColumn: 19 });
    }
  });

  it('should map errors in hoisted imports back to the caller line', async () => {
    const { unit, artifact } = await prepare("const base = 1;\n  import { z } from 'zod';\nz.number().parse(base)");
    const bare = entries.filter(entry => entry.source === 'boot');

    const result = new CompilerInvoker().compile(unit, artifact, bare);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.errors[0]).toMatchObject({ code: 2307, line: 1, column: 19, sourceLine: 2, sourceColumn: 21 });
    }
  });
});

describe('buildCompilerSettings', () => {
  const artifact: GeneratedArtifact = {
    id: 'Unit',
    unitName: 'Unit',
    directory: '/work/Unit',
    sourceFile: '/work/Unit/Unit.ts',
    outputDir: '/work/Unit/out',
    outputFile: '/work/Unit/out/Unit.js'
  };
  const entries: ClasspathEntry[] = [
    { path: '/boot', source: 'boot' },
    { path: '/libs/app.zip', source: 'process' },
    { path: '/libs/node_modules', source: 'manifest', declaredBy: '/libs/app.zip' },
    { path: '/toolchain', source: 'toolchain' }
  ];

  it('should pass the joined classpath', () => {
    const settings = buildCompilerSettings(entries, artifact);

    expect(settings.classpath).toBe(joinClasspath(entries));
    expect(settings.bootClasspath).toBe(joinClasspath(entries));
  });

  it('should write output into the artifact output directory', () => {
    const { options } = buildCompilerSettings(entries, artifact);

    expect(options.outDir).toBe('/work/Unit/out');
    expect(options.rootDir).toBe('/work/Unit');
    expect(options.importHelpers).toBe(true);
  });

  it('should only block emit on errors when type checking', () => {
    const flags = { typeCheck: false, strict: false, deprecationWarnings: true };
    const { options } = buildCompilerSettings(entries, artifact, flags);

    expect(options.noEmitOnError).toBe(false);
    expect(options.strict).toBe(false);
  });
});

describe('moduleRoots', () => {
  it('should drop boot entries and archives', () => {
    expect(moduleRoots([
      { path: '/boot', source: 'boot' },
      { path: '/libs/app.zip', source: 'process' },
      { path: '/libs/node_modules', source: 'manifest' },
      { path: '/toolchain', source: 'toolchain' }
    ])).toEqual(['/libs/node_modules', '/toolchain']);
  });
});
