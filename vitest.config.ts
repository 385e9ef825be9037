/**
 * Vitest configuration for the FlakeLens workspace
 *
 * Runs the unit and in-process integration suites of every package.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',

    include: [
      'apps/*/src/**/__tests__/**/*.test.ts',
      'packages/*/src/**/__tests__/**/*.test.ts',
    ],
    exclude: ['**/node_modules/**', '**/dist/**'],

    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'error',
    },

    testTimeout: 10000,
    hookTimeout: 5000,

    clearMocks: true,
    restoreMocks: true,
    unstubEnvs: true,
  },
});
