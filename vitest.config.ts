import { defineConfig } from 'vitest/config';

/**
 * Pairforge test configuration
 *
 * One run at the root covers every workspace package:
 * - colocated `*.test.ts` and `__tests__/` suites under `src/`
 * - `test/e2e` and `test/property-based` specs of the core package
 */

// Environment-based configuration
const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    // ========================================================================
    // EXECUTION ENVIRONMENT
    // ========================================================================

    environment: 'node',
    pool: 'forks',
    setupFiles: ['./test/setup.ts'],

    // ========================================================================
    // TEST DISCOVERY AND EXECUTION
    // ========================================================================

    include: ['packages/*/{src,test}/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    // No retries - surface issues immediately
    retry: 0,

    // Extended timeouts for property-based testing
    testTimeout: isCI ? 30000 : 10000,
    hookTimeout: 10000,

    reporters: ['default'],

    // ========================================================================
    // COVERAGE CONFIGURATION
    // ========================================================================

    coverage: {
      provider: 'v8',
      reportsDirectory: './coverage',
      reporter: ['text', 'json-summary'],
      include: ['packages/*/src/**/*.ts'],
      exclude: [
        'packages/*/src/**/*.{test,spec}.ts',
        'packages/*/src/**/__tests__/**',
        'packages/*/src/**/__fixtures__/**',
      ],
    },

    env: {
      NODE_ENV: 'test',
      FC_NUM_RUNS: isCI ? '1000' : '100',
    },
  },
});
