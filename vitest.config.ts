import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Suites create their own directories under the working directory
    fileParallelism: false,
    testTimeout: 10000,
  },
});
