import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['./engine/src/test/setup.ts'],
    include: ['shared/**/*.test.ts', 'engine/src/**/*.test.ts', 'server/src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['shared/**', 'engine/src/**', 'server/src/**'],
    },
  },
});
