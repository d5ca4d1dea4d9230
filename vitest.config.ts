import { defineConfig } from 'vitest/config';

// Workspace packages resolve to their TypeScript sources through the
// "source" export condition
const conditions = ['source'];

export default defineConfig({
  resolve: { conditions },
  ssr: { resolve: { conditions } },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    testTimeout: 10000,
  },
});
