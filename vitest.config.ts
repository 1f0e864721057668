import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: ['packages/*/vitest.config.ts'],
    coverage: {
      reporter: ['lcov', 'text'],
      include: ['packages/*/src/**/*.ts'],
    },
  },
});
