import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    pool: 'forks',
    maxConcurrency: 1,
    testTimeout: Number(process.env.VITEST_TIMEOUT ?? 30000),
    include: ['ai/**/__tests__/**/*.test.ts'],
    exclude: ['dist/**', 'node_modules/**'],
  },
});
