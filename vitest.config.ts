import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    // Full-day scenario runs take a few seconds each.
    testTimeout: 60_000,
  },
});
