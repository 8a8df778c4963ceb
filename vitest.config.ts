import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/mcp-server/test/**/*.test.ts'],
    environment: 'node',
    testTimeout: 15000,
    pool: 'forks',
  },
});
