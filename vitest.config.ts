import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 30000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: {
      '@wayfarer/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  esbuild: {
    target: 'node20',
  },
});
