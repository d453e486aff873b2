import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
      LOG_FORMAT: 'json',
    },
    // Filesystem tests share tmp/ under the working directory
    fileParallelism: false,
  },
});
