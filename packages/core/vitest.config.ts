import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      include: [
        'src/chunker/**/*.ts',
        'src/embedding/**/*.ts',
        'src/retrieval/**/*.ts',
        'src/agent/**/*.ts',
        'src/ingest/**/*.ts',
        'src/generation/**/*.ts',
        'src/facts/**/*.ts',
        'src/config/**/*.ts',
      ],
      exclude: [
        'src/**/*.test.ts',
        'src/types/**/*.ts',
      ],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },
  },
});
