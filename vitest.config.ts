import { defineConfig } from 'vitest/config';

/**
 * typebridge test configuration
 *
 * One root configuration covers every workspace package. Property tests use
 * fast-check, so timeouts leave room for their default run counts.
 */

const isCI = process.env.CI === 'true';

export default defineConfig({
  test: {
    environment: 'node',

    // Test files pattern - includes all packages in monorepo
    include: ['packages/*/src/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/coverage/**'],

    // No retries - surface issues immediately
    retry: 0,

    // Extended timeouts for property-based testing
    testTimeout: isCI ? 30000 : 10000,

    reporters: ['default'],

    env: {
      NODE_ENV: 'test',
      FC_NUM_RUNS: isCI ? '500' : '100',
    },
  },
});
