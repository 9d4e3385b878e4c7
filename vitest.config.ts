import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Filesystem tests share the OS temp dir; keep them sequential
    sequence: {
      concurrent: false,
    },
  },
});
