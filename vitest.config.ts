import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    testTimeout: 30000,
    hookTimeout: 30000,
    // Poller tests swap in fake timers; keep files out of each other's way
    fileParallelism: false,
    sequence: {
      hooks: 'list',
    },
  },
});
