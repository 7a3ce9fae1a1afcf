import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    setupFiles: ['src/__tests__/setup.ts'],
    include: ['src/**/*.{test,spec}.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.{test,spec}.ts',
        'src/index.ts', // Entry point excluded from coverage
        'src/__tests__/**/*.ts',
      ],
      reporter: ['text', 'json', 'html'],
      reportsDirectory: './coverage',
    },
  },
});
