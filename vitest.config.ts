import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const packagesDir = fileURLToPath(new URL('./packages', import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@cognisync\/([a-z-]+)\/(.*)\.js$/,
        replacement: `${packagesDir}/$1/$2.ts`,
      },
    ],
  },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['packages/*/src/**/*.integration.test.ts', 'node_modules'],
  },
});
