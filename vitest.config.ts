import path from 'node:path';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) => path.resolve(__dirname, 'packages', name, 'src', 'index.ts');

export default defineConfig({
  resolve: {
    alias: {
      '@buildprof/shared': pkg('shared'),
      '@buildprof/snapshot': pkg('snapshot'),
      '@buildprof/exec': pkg('exec'),
      '@buildprof/core': pkg('core'),
      '@buildprof/cli': pkg('cli'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**', '**/__fixtures__/**'],
  },
});
