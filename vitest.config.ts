import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'dist'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/**/__tests__/**', 'src/**/types.ts', 'src/**/index.ts', 'src/cli.ts'],
      reporter: ['text', 'lcov'],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
