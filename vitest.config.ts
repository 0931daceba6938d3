import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      'gradation-core': path.resolve(root, 'packages/gradation-core/src/index.ts'),
      'gradation-plot': path.resolve(root, 'packages/gradation-plot/src/index.ts'),
    }
  },
  // keep Vite from scanning for a postcss config
  css: { postcss: {} },
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
