/**
 * Vitest configuration for aspectdb
 *
 * Runs every test under tests/ in Node. Each test file builds its own
 * MemoryDocumentStore, so files run in parallel without shared state.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,
    pool: 'forks',
    fileParallelism: true,
    sequence: {
      shuffle: false,
    },
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    testTimeout: 30000,
  },
})
