import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    testTimeout: 30000,
    env: {
      // Keep colour codes out of assertions on printed output
      FORCE_COLOR: '0',
    },
  },
});
