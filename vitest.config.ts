import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts', 'server/src/**/*.test.ts'],
    // Mutation tests fork a worker that loads TypeScript through tsx
    testTimeout: 20000,
  },
});
