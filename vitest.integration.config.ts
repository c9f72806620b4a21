import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // PostgreSQL suites only; they skip themselves without DATABASE_URL
    include: ['src/**/*.int.{test,spec}.ts'],
    pool: 'forks',
    maxWorkers: 1,
    maxConcurrency: 1,
    testTimeout: 15_000,
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
