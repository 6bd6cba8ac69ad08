import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    env: {
      // Keep pipeline progress logs out of test output
      LOG_LEVEL: 'error',
    },
  },
});
