import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    environment: 'node',
    globals: true,
    // The tree-sitter parser is a process-wide singleton
    pool: 'forks',
    testTimeout: 20000,
  },
});
