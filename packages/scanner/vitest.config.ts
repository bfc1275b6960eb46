import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'scanner',
    globals: false,
    environment: 'node',
    include: ['test/**/*.test.ts'],
  },
});
