import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@acqpar/core': fileURLToPath(new URL('./core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['core/src/**/*.test.ts', 'cli/src/**/*.test.ts'],
    environment: 'node',
  },
});
