import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.int.{test,spec}.ts'],
    pool: 'forks',
    maxWorkers: 1,
    maxConcurrency: 1,
    // Integration suites create and drop their own rows; keep them serial
    fileParallelism: false,
  },
});
