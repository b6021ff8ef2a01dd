import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@fileconv/shared': pkg('shared'),
      '@fileconv/server': pkg('server'),
    },
  },
  test: {
    include: ['packages/*/src/tests/**/*.test.ts'],
    environment: 'node',
    testTimeout: 30000,
    hookTimeout: 60000,
  },
});
