import { defineConfig } from 'vitest/config';

/**
 * Vitest configuration for the graph query planner.
 *
 * GRAPH_PLANNER_TEST_WORKERS overrides the fork count for CI/manual control.
 */
const envWorkers = parseInt(process.env.GRAPH_PLANNER_TEST_WORKERS ?? '', 10);
const maxForks = !isNaN(envWorkers) && envWorkers > 0 ? envWorkers : 2;

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks,
        minForks: 1,
      },
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', 'vitest.config.ts', 'vitest.setup.ts'],
    },
  },
});
