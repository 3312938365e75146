import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

// Workspace packages load from their sources; their exports point at dist/
const source = (pkg: string) => fileURLToPath(new URL(`./packages/${pkg}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      'rocket-core': source('rocket-core'),
      'rocket-markdown': source('rocket-markdown'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
    globals: false,
    env: {
      NODE_ENV: 'test',
    },
  },
});
