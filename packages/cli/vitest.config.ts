import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'cli',
    globals: false,
    environment: 'node',
    include: ['test/**/*.test.ts'],
  },
});
