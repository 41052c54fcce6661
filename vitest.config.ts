import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/tests/**/*.spec.ts'],
    setupFiles: ['packages/core/tests/setup.ts'],
    environment: 'node',
    restoreMocks: true,
  },
});
