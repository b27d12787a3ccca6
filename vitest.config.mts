import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@shared/schema': path.resolve(rootDir, './packages/shared/schema/index.ts'),
      '@shared': path.resolve(rootDir, './packages/shared'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['server/**/*.test.ts', 'packages/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json-summary', 'lcov'],
      include: ['server/**/*.ts', 'packages/shared/**/*.ts'],
      exclude: [
        '**/*.test.ts',
        '**/*.d.ts',
        // Entry point — exercised by running the server
        'server/index.ts',
      ],
    },
    testTimeout: 10000,
  },
});
