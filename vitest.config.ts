import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolveSource = (relativePath: string): string =>
  fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      thresholds: {
        lines: 85,
        functions: 85,
        branches: 85,
        statements: 85,
      },
      exclude: [
        'node_modules/',
        'dist/',
        '**/*.d.ts',
        '**/__tests__/**',
        '**/vitest.config.ts',
        '**/*.test.ts',
        '**/index.ts',
      ],
    },
    setupFiles: ['./vitest.setup.ts'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      // Resolve workspace packages to their source files for testing
      '@avfrisk/types': resolveSource('./packages/types/src/index.ts'),
      '@avfrisk/domain': resolveSource('./packages/domain/src/index.ts'),
      '@avfrisk/core': resolveSource('./packages/core/src/index.ts'),
    },
  },
});
