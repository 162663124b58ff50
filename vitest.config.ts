import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['services/*/test/**/*.spec.ts'],
    testTimeout: 15000,
  },
});
