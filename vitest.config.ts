import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    name: 'sentinel-ard',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10_000,
    pool: 'forks',
    environment: 'node',
    setupFiles: ['packages/scene-search/src/__tests__/setup.ts'],
  },
});
