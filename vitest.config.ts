import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',
    include: ['mcp-server/src/**/*.test.ts'],
    exclude: ['node_modules/**/*', '**/dist/**/*'],
  },
});
