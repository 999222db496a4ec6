import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
      RATE_LIMIT_FILE: './tests/fixtures/no-such-rate-limits.json',
    },
    testTimeout: 15000,
  },
});
