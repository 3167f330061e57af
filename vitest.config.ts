import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test file patterns
    include: ['tests/**/*.test.ts'],

    // Exclude node_modules
    exclude: ['node_modules/**'],

    // Environment
    environment: 'node',

    // Globals (describe, it, expect without imports)
    globals: true,

    // Keep per-game log lines out of test output
    env: {
      LOG_LEVEL: 'error',
    },

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'json-summary'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts',
        'src/query.ts',
        'src/types/**',
      ],
    },

    // TypeScript support
    typecheck: {
      enabled: false, // Use tsc for type checking
    },
  },
});
