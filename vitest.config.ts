import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    testTimeout: process.env['CI'] ? 60000 : 30000,
    hookTimeout: process.env['CI'] ? 60000 : 30000,
    env: {
      NODE_ENV: 'production',
      STRATUM_LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      exclude: ['test/**', 'dist/**'],
    },
  },
});
