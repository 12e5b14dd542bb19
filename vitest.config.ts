import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Every package renders into a DOM, so jsdom is the default environment.
    environment: 'jsdom',
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
  },
})
