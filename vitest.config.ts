import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

function fromRoot(relative: string): string {
  return fileURLToPath(new URL(relative, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@assetsmith/core': fromRoot('./packages/core/src/index.ts'),
      '@assetsmith/materials': fromRoot('./packages/materials/src/index.ts'),
      '@assetsmith/pipeline': fromRoot('./packages/pipeline/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'tools/**/*.test.ts'],
    testTimeout: 30_000,
    coverage: {
      provider: 'v8',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/index.ts', '**/test-helpers.ts'],
    },
  },
});
