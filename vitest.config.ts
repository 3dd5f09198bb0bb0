import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    watch: false,
    testTimeout: 10000,
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'error',
      DATABASE_PATH: ':memory:',
      SCHEDULER_ENABLED: 'false',
    },
  },
});
