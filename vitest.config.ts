import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (relative: string): string => fileURLToPath(new URL(relative, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],

    // Prevent resource leaks
    pool: 'forks',

    testTimeout: 15000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: {
      '@services': fromRoot('./src/services'),
      '@tools': fromRoot('./src/tools'),
      '@utils': fromRoot('./src/utils'),
      '@config': fromRoot('./src/config'),
      '@shared': fromRoot('./src/types'),
    },
  },
});
