import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['tender-scraper/**/__tests__/**/*.test.ts', 'scheduler/**/__tests__/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
  },
})
