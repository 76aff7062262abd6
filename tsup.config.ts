import { defineConfig } from 'tsup';

// Runtime dependencies stay external; the compiler and tslib are located on disk at run time.
const externalDependencies = [
  'fflate',
  'fs-extra',
  'tslib',
  'typescript',
  'winston',
  'zod'
];

export default defineConfig({
  entry: {
    index: 'api/index.ts'
  },
  format: ['esm'],
  dts: false,
  clean: true,
  sourcemap: true,
  platform: 'node',
  target: 'node20',
  outDir: 'dist',
  outExtension() {
    return {
      js: '.mjs'
    };
  },
  external: externalDependencies
});
