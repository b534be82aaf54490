import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const workspace = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: '@hookd/utils', replacement: workspace('utils') },
      { find: '@hookd/config', replacement: workspace('config') },
      { find: '@hookd/storage', replacement: workspace('storage') },
      { find: '@hookd/scheduler', replacement: workspace('scheduler') },
      { find: '@hookd/resiliency', replacement: workspace('resiliency') },
      { find: '@hookd/daemon', replacement: workspace('daemon') },
    ],
  },
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./test/vitest.setup.ts'],
    include: ['src/**/*.test.ts', 'packages/**/src/**/*.test.ts', 'test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov', 'html'],
      include: ['src/**/*.ts', 'packages/*/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/__fixtures__/**', 'src/cli/index.ts'],
    },
  },
});
