import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['applications/*/src/**/*.test.{ts,tsx}'],
    environment: 'node',
    restoreMocks: true,
  },
});
