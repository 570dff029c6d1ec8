import { defineConfig } from 'vitest/config';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const rootDir = fileURLToPath(new URL('.', import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@config': path.resolve(rootDir, 'src/config'),
      '@domain': path.resolve(rootDir, 'src/domain'),
      '@engine': path.resolve(rootDir, 'src/engine'),
      '@utils': path.resolve(rootDir, 'src/utils'),
    },
  },
  test: {
    environment: 'node',
    include: ['tests/**/*.spec.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: 'coverage',
      include: ['src/domain/**/*.ts', 'src/engine/**/*.ts', 'src/utils/**/*.ts'],
    },
  },
});
