import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'cli',
    include: ['src/**/*.{test,spec}.ts'],
    exclude: ['dist', 'node_modules'],
    environment: 'node',
    globals: true,
    reporters: ['default'],
  },
});
