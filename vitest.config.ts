import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/test/**/*.test.ts', 'modules/first-party/*/test/**/*.test.ts'],
    environment: 'node',
  },
});
