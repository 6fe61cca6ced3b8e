import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@cartkit/core': fileURLToPath(new URL('packages/core/src/index.ts', import.meta.url)),
      '@cartkit/parser-srl': fileURLToPath(
        new URL('packages/parser/srl/src/index.ts', import.meta.url),
      ),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['packages/**/tests/**/*.test.ts'],
  },
});
