import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/*.test.ts', 'services/**/*.test.ts'],
    // Unit tests only: storage and queues are replaced in process.
    testTimeout: 10_000,
  },
});
