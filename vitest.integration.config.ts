import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: false,
    include: ['packages/postgres/tests/integration.test.ts'],
    testTimeout: 30_000,
  },
})
