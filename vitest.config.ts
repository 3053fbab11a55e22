import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'jsdom',
    include: ['site/src/**/__tests__/**/*.test.ts'],
  },
});
