import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    target: 'es2020',
  },
  test: {
    environment: 'node',

    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['**/*.d.ts', 'src/index.ts'],
      thresholds: {
        statements: 80,
        branches: 80,
        functions: 80,
        lines: 80,
      },
    },

    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    testTimeout: 10000,

    clearMocks: true,
    restoreMocks: true,
  },
});
