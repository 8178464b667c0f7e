import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Global test settings
    globals: true,

    // Test environment
    environment: 'node',

    // Test file patterns
    include: ['src/**/*.test.ts'],

    // Exclude patterns
    exclude: ['node_modules', 'dist', '**/examples/**'],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/__tests__/**', 'src/index.ts'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80,
      },
    },

    // Test timeout
    testTimeout: 10000,
    hookTimeout: 10000,

    // Mock reset
    clearMocks: true,
    restoreMocks: true,
  },
});
