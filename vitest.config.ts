import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts', 'vended_tools/**/__tests__/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*', 'vended_tools/**/*'],
      exclude: ['src/**/__tests__/**', 'src/**/__fixtures__/**', 'vended_tools/**/__tests__/**', 'src/cli.ts'],
    },
  },
})
