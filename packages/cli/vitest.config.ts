import { fileURLToPath } from 'node:url';
import { defineProject } from 'vitest/config';

export default defineProject({
  resolve: {
    // Tests run against core's sources; the package export points at its build output
    alias: {
      '@doclinks/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    name: 'cli',
    include: ['__tests__/**/*.test.ts'],
    environment: 'node',
  },
});
