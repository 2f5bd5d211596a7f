import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@core-types': path.resolve(root, 'packages/core-types/src'),
      '@lagrange-core': path.resolve(root, 'packages/lagrange-core/src'),
      '@ti-io': path.resolve(root, 'packages/ti-io/src'),
    }
  },
  test: {
    globals: true,
    environment: 'node',
    include: [
      'packages/*/tests/**/*.test.ts',
      'apps/*/tests/**/*.test.ts'
    ],
    exclude: [
      '**/node_modules/**',
      '**/dist/**'
    ]
  },
});
