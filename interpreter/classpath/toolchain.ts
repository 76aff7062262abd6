import * as path from 'path';
import { createRequire } from 'module';
import { ClasspathResolutionError } from '@core/errors';

/**
 * Module roots (node_modules directories) the compiler and the runtime
 * helper library were installed into.
 */
export interface ToolchainLocations {
  readonly compiler: string;
  readonly runtimeLibrary: string;
}

export const COMPILER_MODULE = 'typescript';
export const RUNTIME_LIBRARY_MODULE = 'tslib';

const requireFromHere = createRequire(import.meta.url);

let discovered: ToolchainLocations | undefined;

/**
 * Resolve a module and return the node_modules directory that contains it.
 */
export function moduleRootOf(
  moduleId: string,
  resolve: (id: string) => string = requireFromHere.resolve
): string {
  let resolved: string;
  try {
    resolved = resolve(moduleId);
  } catch (error) {
    throw new ClasspathResolutionError('Cannot locate toolchain module', moduleId, error);
  }

  const marker = `${path.sep}node_modules${path.sep}${moduleId.split('/').join(path.sep)}${path.sep}`;
  const index = resolved.lastIndexOf(marker);
  if (index < 0) {
    throw new ClasspathResolutionError(`Toolchain module resolved outside node_modules (${resolved})`, moduleId);
  }
  return resolved.slice(0, index + `${path.sep}node_modules`.length);
}

/**
 * Locations of the compiler and its runtime library. Discovered on first
 * use and frozen; later calls return the same object.
 */
export function toolchainLocations(): ToolchainLocations {
  if (!discovered) {
    discovered = Object.freeze({
      compiler: moduleRootOf(COMPILER_MODULE),
      runtimeLibrary: moduleRootOf(RUNTIME_LIBRARY_MODULE)
    });
  }
  return discovered;
}
