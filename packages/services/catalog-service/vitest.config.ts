import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'catalog-service',
    globals: true,
    environment: 'node',
    testTimeout: 20000,
    hookTimeout: 30000,
    include: ['src/**/*.test.ts', 'src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
