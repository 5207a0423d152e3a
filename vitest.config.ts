import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const resolveLib = (entry: string): string => fileURLToPath(new URL(entry, import.meta.url));

const alias = {
  '@courier-http/core': resolveLib('./libs/courier-core/src/index.ts'),
  '@courier-http/oauth2': resolveLib('./libs/courier-oauth2/src/index.ts'),
};

export default defineConfig({
  test: {
    environment: 'node',
    include: ['libs/*/src/**/__tests__/**/*.test.ts'],
  },
  resolve: {
    alias,
  },
});
