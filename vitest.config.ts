import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: [
      'tests/**/*.test.ts',
      'packages/*/src/**/*.test.ts',
      'apps/*/src/**/*.test.ts',
    ],
    environment: 'node',
  },
  resolve: {
    alias: {
      '@concierge/types': path.resolve(root, 'packages/types/src/index.ts'),
      '@concierge/core': path.resolve(root, 'packages/core/src/index.ts'),
      '@concierge/tools': path.resolve(root, 'packages/tools/src/index.ts'),
      '@concierge/runtime': path.resolve(root, 'packages/runtime/src/index.ts'),
      '@concierge/persistence': path.resolve(root, 'packages/persistence/src/index.ts'),
    },
  },
});
