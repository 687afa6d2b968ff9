import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    watch: false,
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '.runtime']
  }
});
