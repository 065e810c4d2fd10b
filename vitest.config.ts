import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },
    testTimeout: 20000,
    hookTimeout: 20000,
    sequence: {
      concurrent: false,
    },
    include: ['src/tests/**/*.spec.ts'],
  },
});
