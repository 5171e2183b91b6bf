import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    // Hook and daemon tests spawn short shell scripts
    testTimeout: 10000,
    globals: true,
  },
});
