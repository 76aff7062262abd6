import * as path from 'path';
import ts from 'typescript';

const PROBE_FILE = '__evalconf_resolve__.ts';

/**
 * Name of the DefinitelyTyped package for a specifier:
 * `lodash/fp` -> `lodash/fp`, `@scope/pkg` -> `scope__pkg`.
 */
export function typesPackageName(specifier: string): string {
  if (!specifier.startsWith('@')) {
    return specifier;
  }
  const [scope, name, ...rest] = specifier.slice(1).split('/');
  return [`${scope}__${name}`, ...rest].join('/');
}

/**
 * Resolve a module specifier through an ordered list of module roots. Each
 * root is searched as if the specifier were a path inside it, then for its
 * `@types` package; the first hit wins. Relative and absolute specifiers use
 * the compiler's own resolution.
 */
export function resolveThroughRoots(
  specifier: string,
  containingFile: string,
  roots: readonly string[],
  options: ts.CompilerOptions,
  host: ts.ModuleResolutionHost
): ts.ResolvedModuleWithFailedLookupLocations {
  if (specifier.startsWith('.') || path.isAbsolute(specifier)) {
    return ts.resolveModuleName(specifier, containingFile, options, host);
  }

  if (!specifier.startsWith('node:')) {
    for (const root of roots) {
      const probe = path.join(root, PROBE_FILE);
      for (const candidate of [`./${specifier}`, `./@types/${typesPackageName(specifier)}`]) {
        const result = ts.resolveModuleName(candidate, probe, options, host);
        if (result.resolvedModule) {
          return {
            resolvedModule: { ...result.resolvedModule, isExternalLibraryImport: true }
          };
        }
      }
    }
  }

  // Unresolved: the checker falls back to ambient declarations (e.g. node builtins)
  return { resolvedModule: undefined };
}
