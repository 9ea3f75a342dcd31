import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['bot/src/tests/**/*.test.ts'],
    environment: 'node',
  },
});
