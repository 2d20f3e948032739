import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    // Environment
    globals: true,
    environment: 'node',

    // Unit tests only talk to in-process fakes
    testTimeout: 5000,
    hookTimeout: 5000,

    // Test file patterns
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],

    reporters: ['default'],

    // Suppress structured error logs emitted during negative tests
    onConsoleLog: (log, type) => {
      if (type === 'stderr' && log.includes('"level":"error"')) {
        return false
      }
      return true
    },

    setupFiles: ['./tests/setup.ts'],

    // Mock configuration
    clearMocks: true
  }
})
