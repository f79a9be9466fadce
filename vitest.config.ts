import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.unit.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      include: ['lib/**', 'common/**', 'executors/**'],
      exclude: ['**/*.test.*', '**/node_modules/**', '**/test/**'],
      thresholds: {
        branches: 70,
        functions: 70,
        lines: 70,
        statements: 70,
      },
    },
  },
});
