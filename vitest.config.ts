import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 30000,
    setupFiles: ['tests/setup.ts'],
  },
  esbuild: {
    target: 'node20',
  },
});
