import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['cli/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    testTimeout: 30_000,
  },
});
