import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    testTimeout: 30000,
    include: ['tests/**/*.test.ts'],
    env: {
      NODE_ENV: 'test',
    },
  },
});
