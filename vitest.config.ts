import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['engine/**/*.{test,spec}.ts', 'cli/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      '@yxgraph/engine': fileURLToPath(new URL('./engine/src/index.ts', import.meta.url)),
    },
  },
});
