import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    setupFiles: ['tests/setup.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test'
    },
    globals: true,
    // Every evaluation runs the TypeScript compiler
    testTimeout: 60_000,
    include: [
      'api/**/*.test.ts',
      'core/**/*.test.ts',
      'interpreter/**/*.test.ts',
      'services/**/*.test.ts'
    ],
    exclude: [
      'node_modules',
      'dist'
    ]
  }
});
