import { defineProject } from 'vitest/config';

export default defineProject({
  test: {
    name: 'core',
    include: ['__tests__/**/*.test.ts'],
    environment: 'node',
    // tree-sitter WASM grammars load once per worker
    testTimeout: 20_000,
    hookTimeout: 20_000,
  },
});
