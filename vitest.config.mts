import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    // Include patterns
    include: [
      'packages/**/__tests__/**/*.test.ts',
      'apps/**/__tests__/**/*.test.ts',
      'test/**/*.e2e.test.ts',
    ],

    // Exclude patterns
    exclude: ['**/node_modules/**', '**/dist/**'],

    // Live scenarios set their own per-test timeout
    testTimeout: 30000,
    hookTimeout: 60000,

    reporters: ['default'],
    watch: false,

    // Clear call history only; module mocks keep their implementations
    clearMocks: true,
    mockReset: false,
    restoreMocks: false,

    retry: 0,
  },
});
