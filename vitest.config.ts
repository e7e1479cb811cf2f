import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts'],
      // Types only, and the CLI entry point which runs on import
      exclude: ['src/lib/types.ts', 'src/cli.ts'],
    },
  },
});
