import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    env: {
      CAPWALK_LOG_LEVEL: 'silent',
    },
  },
});
