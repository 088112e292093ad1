/**
 * @file vitest.integration.config.ts
 * @description Vitest configuration for integration tests.
 *
 * Includes:
 * - Toolchain discovery tests (require macOS + Xcode)
 *
 * These tests exercise the installed toolchain and are meant to be
 * run manually or in dedicated CI jobs on macOS.
 *
 * Run with: npm run test:integration
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/__tests__/integration/**/*.integration.test.ts'],
    testTimeout: 180000, // 3 minutes per test
    hookTimeout: 60000,
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true, // Run sequentially; tests share the toolchain
      },
    },
    bail: 1,
    reporters: ['verbose'],
  },
});
