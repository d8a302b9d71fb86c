import { defineConfig } from 'vitest/config';
import os from 'os';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    include: ['packages/**/__tests__/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.{idea,git,cache,output,temp}/**',
    ],

    // ===================================================================
    // PERFORMANCE
    // ===================================================================

    // Forks rather than threads: cancellation tests register process signal handlers
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: os.cpus().length,
        minForks: 1,
        isolate: true,
      },
    },
    fileParallelism: true,

    // Timing tests use real timers with short delays
    testTimeout: 10000,
    hookTimeout: 10000,

    // ===================================================================
    // COVERAGE (enabled with --coverage)
    // ===================================================================

    coverage: {
      provider: 'v8',
      reporter: ['text', 'text-summary', 'lcov'],
      reportsDirectory: './coverage',
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        '**/__tests__/**',
        '**/*.test.ts',
        '**/node_modules/**',
        '**/dist/**',
        '**/index.ts',
      ],
      clean: true,
    },

    reporters: ['default'],
    watch: false,

    // ===================================================================
    // MOCKING
    // ===================================================================

    mockReset: true,
    restoreMocks: true,
    clearMocks: true,

    retry: 0,
    bail: 0,
  },
});
