import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const source = (name: string) => fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
  },
  // Workspace packages export their built output; tests run against sources.
  resolve: {
    alias: {
      '@execmon/logevt': source('logevt'),
      '@execmon/logfmt': source('logfmt'),
      '@execmon/config': source('config'),
    },
  },
});
