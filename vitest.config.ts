import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    setupFiles: ['src/tests/setup.ts'],
    env: {
      LOG_LEVEL: 'silent',
      UNSUBSCRIBE_SECRET: 'test-secret',
      FRONTEND_BASE_URL: 'https://app.example.test',
    },
    testTimeout: 10000,
  },
});
