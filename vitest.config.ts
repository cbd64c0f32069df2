import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    setupFiles: ['src/test-utils/setup.ts'],
    env: {
      CRM_DATABASE_PATH: ':memory:'
    }
  }
})
