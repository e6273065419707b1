import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      // Subpath imports resolve straight to the TypeScript sources
      {
        find: /^@hostbridge\/(utils|protocol|config|daemon|sdk|mcp|cli)\/(.+)$/,
        replacement: path.resolve(rootDir, './packages/$1/src/$2.ts'),
      },
      // Main package entries (must come after subpath patterns)
      {
        find: /^@hostbridge\/(utils|protocol|config|daemon|sdk|mcp|cli)$/,
        replacement: path.resolve(rootDir, './packages/$1/src/index.ts'),
      },
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./test/vitest.setup.ts'],
    include: ['packages/**/src/**/*.test.ts', 'packages/**/tests/**/*.test.ts', 'test/**/*.test.ts'],
    testTimeout: 10_000,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/**/*.test.ts'],
    },
  },
});
