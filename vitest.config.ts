import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['mcp/**/*.test.ts', 'tools/**/*.test.ts'],
    environment: 'node',
  },
});
