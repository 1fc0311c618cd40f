import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    // The full-size composite and ten sharp resizes run in-process.
    testTimeout: 20000,
    hookTimeout: 20000,
  },
});
