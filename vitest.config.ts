import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    coverage: {
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', '**/__tests__/**'],
    },
  },
  resolve: {
    alias: {
      '@nestedtx/core': path.resolve(__dirname, 'packages/core/src'),
      '@nestedtx/mysql': path.resolve(__dirname, 'packages/mysql/src'),
      '@nestedtx/postgresql': path.resolve(__dirname, 'packages/postgresql/src'),
    },
  },
});
