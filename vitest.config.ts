import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/**/*.test.ts', 'packages/**/*.spec.ts'],
    // Bounded gap searches and year-long sweeps call Intl thousands of times
    testTimeout: 20_000,
  },
});
