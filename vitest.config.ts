import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts', 'shared/**/*.test.ts', 'notify/**/*.test.ts'],
    environment: 'node',
    watch: false,
    env: {
      TZ: 'UTC',
    },
  },
});
