import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    include: ['ssdb-shared/src/**/*.test.ts', 'ssdb-cli/src/**/*.test.{ts,tsx}'],
    environment: 'node',
  },
});
