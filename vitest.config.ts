import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      // Only src/ counts towards coverage
      include: ['src/**/*.ts'],
      exclude: [
        '**/*.d.ts',
        // Entry points (re-exports only)
        'src/index.ts',
        'src/core/index.ts',
        'src/gssapi/index.ts',
        'src/config/index.ts',
        'src/config/secrets/index.ts',
        // Type-only files
        'src/core/types.ts',
        'src/gssapi/types.ts',
        // Test support shipped for consumers
        'src/testing/**',
      ],
      thresholds: {
        statements: 80,
        branches: 75,
        functions: 80,
        lines: 80,
      },
      all: true,
      skipFull: false,
    },
  },
});
