import { defineConfig } from 'vitest/config';

/**
 * Root Vitest Configuration
 *
 * Runs every package as its own project; each package's vitest.config.ts
 * holds its test settings. Coverage is collected here across projects.
 *
 * Usage:
 *   npm test                          # Run all packages once
 *   npx vitest run --project=core     # Run a single package
 */
export default defineConfig({
  test: {
    projects: ['core', 'config', 'reader'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['**/src/**/*.ts'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', '**/__tests__/**'],
      thresholds: {
        statements: 75,
        branches: 70,
        functions: 75,
        lines: 75,
      },
    },
  },
});
