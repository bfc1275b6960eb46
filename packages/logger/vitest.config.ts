import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'logger',
    globals: false,
    environment: 'node',
    include: ['test/**/*.test.ts'],
  },
});
