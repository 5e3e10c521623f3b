import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['mcp_ftp/tests/**/*.spec.ts'],
  },
});
