/**
 * Vitest configuration for catalog-sync
 *
 * Unit tests run under Node against temporary directories and in-memory
 * object stores; nothing leaves the process.
 */

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    pool: 'forks',
    fileParallelism: true,
    sequence: {
      shuffle: false,
    },
    testTimeout: 30000,
  },
})
