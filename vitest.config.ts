import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['services/*/tests/**/*.test.ts', 'sdks/*/tests/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    environment: 'node',
  },
});
