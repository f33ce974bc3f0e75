import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // Workspace packages load from their TypeScript sources, no build needed
    alias: {
      '@account-plan/agents': fileURLToPath(new URL('./packages/agents/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10_000,
    env: { LOG_LEVEL: 'error' },
  },
});
