import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    // tests create and remove real directories under the OS temp dir
    testTimeout: 30_000,
  },
});
