import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

function packageDir(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      '@ideaweaver/shared': packageDir('shared'),
      '@ideaweaver/schemas': packageDir('schemas'),
      '@ideaweaver/ingestion': packageDir('ingestion'),
      '@ideaweaver/core': packageDir('core'),
    },
  },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules'],
  },
});
