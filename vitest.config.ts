import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['sdks/typescript/*/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text'],
      include: ['sdks/typescript/*/src/**/*.ts'],
      exclude: ['**/*.test.ts'],
    },
  },
  resolve: {
    alias: {
      '@sccp-ts/core': fileURLToPath(
        new URL('./sdks/typescript/core/src/index.ts', import.meta.url)
      ),
    },
  },
});
