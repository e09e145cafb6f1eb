import { resolve } from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts', 'services/*/tests/**/*.test.ts', 'services/*/src/**/*.spec.ts'],
    testTimeout: 30_000
  },
  resolve: {
    alias: {
      '@label-sheet/lib': resolve(__dirname, 'packages/lib/src/index.ts'),
      '@label-sheet/labeler': resolve(__dirname, 'services/labeler/src/index.ts')
    }
  }
});
