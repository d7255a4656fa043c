import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Each test file boots its own in-process PGlite instance
    pool: 'forks',
    // Longer timeout for database startup
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
