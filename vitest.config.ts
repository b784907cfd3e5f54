import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    // CDK synthesis in the infrastructure test is slow on cold starts
    testTimeout: 30000,
  },
});
