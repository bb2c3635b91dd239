import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // The bridge suites spawn their own worker threads.
    pool: 'forks',
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
