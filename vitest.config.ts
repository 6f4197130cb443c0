import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolve = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    watch: false,
    fileParallelism: true,
    include: ['tests/**/*.test.ts'],
    exclude: ['node_modules'],
    testTimeout: 10000,
  },
  resolve: {
    alias: {
      'sumwire': resolve('./packages/core/src/index.ts'),
      '@sumwire/protocol-tcp': resolve('./packages/protocol-tcp/src/index.ts'),
    },
  },
});
