import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['simulation/**/__tests__/**/*.test.ts', 'server/**/__tests__/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20_000
  }
});
