import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // Run against the client sources so tests need no build first
    alias: [
      {
        find: /^@rcon-kit\/client\/testing$/,
        replacement: fileURLToPath(new URL('../rcon-client/src/testing/index.ts', import.meta.url)),
      },
      {
        find: /^@rcon-kit\/client$/,
        replacement: fileURLToPath(new URL('../rcon-client/src/index.ts', import.meta.url)),
      },
    ],
  },
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    watch: false,
    testTimeout: 10000,
  },
});
