import { defineConfig } from 'vitest/config';

// eslint-disable-next-line import-x/no-default-export -- vitest requires default export for config
export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'threads',
    poolOptions: {
      threads: {
        singleThread: false,
        isolate: true,
        minThreads: 1,
        maxThreads: 4,
      },
    },
    fileParallelism: true,
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        lines: 90,
        functions: 90,
        branches: 90,
        statements: 90,
      },
      exclude: [
        'node_modules/**',
        '**/node_modules/**',
        '**/*.d.ts',
        '**/index.ts',
        '**/types.ts', // Type definitions don't need coverage
        '**/*.config.ts',
        '**/dist/**',
        '**/coverage/**',
        '**/__tests__/**', // Test files don't need coverage
        // Database schema definitions are declarative, not testable
        'packages/database/src/schema/**',
        // CLI benchmark entry points don't need unit tests
        'benchmarks/**/src/benchmark.ts',
      ],
    },
    include: [
      'packages/**/__tests__/**/*.test.ts',
      'benchmarks/**/__tests__/**/*.test.ts',
    ],
    exclude: [
      'node_modules',
      '**/node_modules/**',
    ],
  },
});
