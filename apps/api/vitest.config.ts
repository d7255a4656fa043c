import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts', 'src/**/*.test.ts'],
    // Each test file boots its own in-process PGlite instance
    pool: 'forks',
    testTimeout: 30000,
    hookTimeout: 30000,
  },
});
