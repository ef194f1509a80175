import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
    env: {
      RAG_LOG_DIR: '.textrag/test-logs',
      RAG_LOG_LEVEL: 'silent',
    },
  },
});
