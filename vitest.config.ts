import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['libs/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
