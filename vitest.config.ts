import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@sensim/shared': pkg('shared'),
      '@sensim/core': pkg('core'),
      '@sensim/environment': pkg('environment'),
      '@sensim/engine': pkg('engine'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.spec.ts', 'packages/*/tests/**/*.spec.ts'],
  },
});
