import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    clearMocks: true,
    // Synthetic 4D volumes make a few end-to-end tests slower than the default budget.
    testTimeout: 30_000,
  },
});
