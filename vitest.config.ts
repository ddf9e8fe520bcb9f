import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['stager/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
