import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    testTimeout: 10000,
    hookTimeout: 10000,
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/fixtures/setup.ts'],
    // Each test file opens its own database file; keep files apart
    fileParallelism: false,
    env: {
      DATAFLAG_DATA_DIR: './data/test', // Isolate tests from a real database
      LOG_LEVEL: 'error',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        // Entry points are thin wrappers over the services
        'src/cli.ts',
        'src/index.ts',
        // Type definitions and barrels
        '**/types.ts',
        '**/index.ts',
      ],
    },
  },
});
