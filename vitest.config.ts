import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    coverage: {
      provider: 'v8',
      reporter: ['html', 'json', 'lcov', 'text'],
      include: ['lib/**/*.ts'],
      exclude: ['lib/**/*.{test,spec}.ts', 'lib/**/testHelpers.ts'],
    },
    environment: 'node',
    include: ['lib/**/*.{test,spec}.ts', 'scripts/**/*.{test,spec}.ts'],
  },
});
