import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Keep debug logging out of test output
    env: {
      LOG_LEVEL: 'error',
    },
  },
});
