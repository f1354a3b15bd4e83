import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['core/src/**/*.test.ts', 'cli/src/**/*.test.ts'],
    testTimeout: 30_000, // defuddle parses full documents through jsdom
    hookTimeout: 10_000,
  },
});
