import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const coreSrc = (file: string): string =>
  fileURLToPath(new URL(`./packages/core/src/${file}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: /^@lookform\/core\/testing$/, replacement: coreSrc('testing/index.ts') },
      { find: /^@lookform\/core$/, replacement: coreSrc('index.ts') },
    ],
  },
  test: {
    include: [
      'packages/core/__tests__/**/*.test.ts',
      'packages/generator/src/__tests__/**/*.test.ts',
    ],
    environment: 'node',
  },
});
