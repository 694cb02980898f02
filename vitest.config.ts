import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    setupFiles: ['./tests/setup.ts'],
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    globals: true,
    testTimeout: 10000,
    // Mock external modules
    alias: {
      '@anthropic-ai/sdk': fileURLToPath(new URL('./tests/mocks/anthropic.ts', import.meta.url)),
    },
  },
});
