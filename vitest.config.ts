import { defineConfig } from 'vitest/config';

/**
 * Root Vitest configuration: every workspace package is a project with its
 * own vitest.config.ts, so `vitest run` at the root covers the whole tree.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'forks',

    // No retries: surface issues immediately
    retry: 0,
    fileParallelism: !isCI,

    // Bridge tests spawn worker processes; keep headroom for slow CI hosts
    testTimeout: isCI ? 30000 : 20000,
    hookTimeout: 10000,
    teardownTimeout: 5000,

    reporters: ['default'],

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'lcov', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.d.ts',
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
      ],
    },

    projects: ['packages/*'],

    env: {
      NODE_ENV: 'test',
      DIFFPROBE_LOG_LEVEL: 'silent',
      FC_NUM_RUNS: isCI ? '500' : '100',
    },
  },
});
