import { defineConfig } from 'vitest/config';

/**
 * Vitest Configuration for pagecite
 *
 * Tests live in __tests__/ directories beside the sources. They touch only
 * in-memory or temporary SQLite databases, so a small fork pool suffices;
 * override the worker count with PAGECITE_TEST_WORKERS.
 */
const envWorkers = parseInt(process.env.PAGECITE_TEST_WORKERS ?? '', 10);
const maxWorkers = !isNaN(envWorkers) && envWorkers > 0 ? envWorkers : 2;

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 30000,
    hookTimeout: 10000,
    // better-sqlite3 is a native addon; forks keep each file in its own process
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: maxWorkers,
        minForks: 1,
      },
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.test.ts',
        'src/test/**',
        'vitest.config.ts',
        'vitest.setup.ts',
      ],
    },
  },
});
