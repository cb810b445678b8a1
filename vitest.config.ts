import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 15000,
    // Each file opens its own HTTP server and SQLite files
    pool: 'forks',
  },
});
