import { defineConfig } from 'vitest/config';
import { fileURLToPath, URL } from 'url';

export default defineConfig({
  // Path aliases matching tsconfig
  resolve: {
    alias: {
      '@core': fileURLToPath(new URL('./packages/core/src', import.meta.url)),
      '@compiler': fileURLToPath(new URL('./packages/compiler/src', import.meta.url)),
    },
  },

  test: {
    include: ['packages/**/*.test.ts'],
    environment: 'node',
  },
});
