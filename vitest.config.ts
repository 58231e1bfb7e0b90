import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/__tests__/**/*.test.ts'],
    testTimeout: 20000,
    hookTimeout: 20000,
    setupFiles: ['tests/setup.ts'],
    env: {
      // Keep colour codes out of asserted log lines.
      FORCE_COLOR: '0',
      SHW_COLOR: 'never'
    }
  },
})
