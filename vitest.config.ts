import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    setupFiles: ['./test/setup/test-setup.ts'],

    include: [
      'test/**/*.test.ts',
      'test/**/*.spec.ts'
    ],
    exclude: [
      'node_modules',
      'dist'
    ],

    testTimeout: 10000,
    hookTimeout: 10000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      reportsDirectory: './coverage',
      exclude: [
        'node_modules/**',
        'dist/**',
        'test/**',
        'src/types/**',
        'src/config/**'
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 75,
        statements: 80
      }
    },

    watch: false
  }
});
