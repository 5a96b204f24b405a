import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@tunnel-dns/core': fileURLToPath(new URL('./packages/core/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['packages/*/src/__tests__/**/*.test.ts', 'tunnel-dns/src/__tests__/**/*.test.ts'],
  },
});
