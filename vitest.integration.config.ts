import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.{test,spec}.ts'],
    // One database, one suite at a time
    pool: 'forks',
    maxWorkers: 1,
    minWorkers: 1,
    maxConcurrency: 1,
    testTimeout: 20000,
  },
});
