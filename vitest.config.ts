import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['app/backend/tests/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_SILENT: '1',
    },
    testTimeout: 20000,
  },
});
