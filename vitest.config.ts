import { defineConfig } from 'vitest/config';

/**
 * Every test runs against in-process fakes of the git runner and the linters;
 * fixture files live in temp directories under os.tmpdir().
 */
export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
    pool: 'forks',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary'],
      include: ['src/**/*.ts'],
      exclude: ['src/**/__tests__/**', 'src/cli/index.ts'],
    },
  },
});
