import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    globals: true,
    testTimeout: 30000,
    restoreMocks: true,
  },
  resolve: {
    alias: {
      '@folioforge/agents': path.resolve(root, 'agents/src/index.ts'),
      '@folioforge/core': path.resolve(root, 'packages/core/src/index.ts'),
      '@folioforge/llm': path.resolve(root, 'packages/llm/src/index.ts'),
      '@folioforge/schemas': path.resolve(root, 'packages/schemas/src/index.ts'),
      '@folioforge/cli': path.resolve(root, 'apps/cli/src/index.ts'),
    },
  },
});
