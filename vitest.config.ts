import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolve = (path: string): string => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@plantgate\/core\/test$/, replacement: resolve('./packages/core/src/test.ts') },
      { find: /^@plantgate\/core$/, replacement: resolve('./packages/core/src/index.ts') },
      { find: /^@plantgate\/postgres$/, replacement: resolve('./packages/postgres/src/index.ts') },
      { find: /^@plantgate\/express$/, replacement: resolve('./packages/express/src/index.ts') },
    ],
  },
  test: {
    include: ['packages/*/{src,test}/**/*.test.ts'],
    environment: 'node',
  },
});
