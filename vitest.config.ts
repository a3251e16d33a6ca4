import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    environment: 'node',
    // better-sqlite3 is a native module; forks keep it out of worker threads
    pool: 'forks',
    testTimeout: 10000,
  },
});
