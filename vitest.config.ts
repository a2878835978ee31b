import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Resource limits - the transport tests bind local sockets
    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: 2,
        minForks: 1,
      },
    },
    maxConcurrency: 3,
    fileParallelism: false,

    include: ['test/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/types/**',
        'src/cli/**', // CLI not unit testable
        'src/**/index.ts', // Re-export files
      ],
      all: true,
    },
  },
});
