import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    include: ['packages/*/src/**/*.test.{ts,tsx}'],
    environment: 'node',
    setupFiles: ['packages/ui/src/test/setup.ts'],
    restoreMocks: true,
  },
});
