import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // Several suites swap process.env (RUSTEXT_DEBUG, PATH) and create temp
    // crates under tmpdir(). Keep files sequential for determinism.
    fileParallelism: false,
    testTimeout: 30_000,
  },
});
