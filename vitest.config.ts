/**
 * FILE PURPOSE: Root Vitest config for the workspace
 *
 * HOW: Discovers tests under every package's tests/ directory so a single
 *      `vitest run` at the root covers the whole tree.
 */

import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/**/tests/**/*.test.ts'],
    passWithNoTests: false,
    coverage: {
      provider: 'v8',
      include: ['packages/**/src/**/*.ts'],
      exclude: ['**/index.ts'],
    },
  },
});
