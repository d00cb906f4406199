import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@ledgersync/types': path.resolve(root, 'packages/types/src/index.ts'),
      '@ledgersync/store': path.resolve(root, 'packages/store/src/index.ts'),
      '@ledgersync/categorizer': path.resolve(root, 'packages/categorizer/src/index.ts'),
      '@ledgersync/ledger': path.resolve(root, 'packages/ledger/src/index.ts'),
      '@ledgersync/plaid-bridge': path.resolve(root, 'packages/plaid-bridge/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
