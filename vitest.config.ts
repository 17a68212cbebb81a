import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['apps/**/*.test.ts', 'packages/**/*.test.ts'],
    environment: 'node',
    // Tests build and format dates in local time
    env: { TZ: 'UTC' },
  },
});
