import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['./tests/setup.ts'],
    testTimeout: 15000,
    hookTimeout: 15000,
    teardownTimeout: 15000,
    silent: false,
    reporters: ['default'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      reportsDirectory: './coverage',
      exclude: [
        'node_modules/**',
        'tests/**',
        'examples/**',
        'src/index.ts',
        '**/*.d.ts',
        'dist/**',
        'coverage/**',
        'vitest.config.ts',
      ],
      thresholds: {
        lines: 81,
        functions: 75,
        branches: 80,
        statements: 81,
      },
    },
  },
});
