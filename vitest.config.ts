import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Keep a repo-root `.env` (API keys) out of test runs.
  envDir: 'src',
  test: {
    globals: false,
    environment: 'node',
    include: ['src/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    restoreMocks: true,
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
