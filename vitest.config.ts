import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'error',
      LOG_TO_FILE: 'false',
      LOG_TO_LOGTAIL: 'false',
    },
  },
});
