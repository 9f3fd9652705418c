import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['apps/backend/src/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 20_000,
  },
})
