import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'tests/**/*.test.ts'],
    testTimeout: 20000,
    hookTimeout: 20000,
    setupFiles: ['tests/setup.ts'],
    env: {
      // Keep logger output free of ANSI codes unless a test opts in.
      FORCE_COLOR: '0'
    }
  },
})
