/**
 * @file vitest.config.ts
 * @description Vitest configuration for unit tests.
 *
 * Integration tests that need macOS + Xcode live under
 * src/__tests__/integration and run through vitest.integration.config.ts.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/__tests__/**/*.test.ts'],
    exclude: ['src/__tests__/integration/**', 'node_modules/**', 'dist/**'],
    environment: 'node',
    testTimeout: 10000,
  },
});
