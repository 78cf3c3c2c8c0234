import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Test file patterns
    include: ['tests/**/*.test.ts'],

    // Watch mode settings
    watch: false,

    // Global test timeout
    testTimeout: 10000,

    // Run tests in parallel for speed
    pool: 'threads',
  },
});
