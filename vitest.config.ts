import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    environment: 'node',
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'fatal',
      LOG_FILE_ENABLED: 'false',
      LOG_PERF_ENABLED: 'false',
    },
  },
});
