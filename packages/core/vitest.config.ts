import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'core',
    environment: 'node',
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/**/*.d.ts', 'src/**/*.test.ts', 'src/**/__tests__/**'],
    },
    // Evaluator bridge tests start real worker processes
    testTimeout: 20000,
    env: {
      DIFFPROBE_LOG_LEVEL: 'silent',
    },
  },
});
