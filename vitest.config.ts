import path from 'path';
import { fileURLToPath } from 'url';

import { defineConfig } from 'vitest/config';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    // DOM tests opt into jsdom with a @vitest-environment comment
    environment: 'node',
    setupFiles: ['./test/setup.ts'],
    include: ['**/*.{test,spec}.{ts,tsx}'],
    exclude: ['node_modules', 'dist'],
    testTimeout: 10000,
    isolate: true,
  },
  resolve: {
    alias: {
      '@kernel': path.resolve(__dirname, 'packages/kernel'),
      '@config': path.resolve(__dirname, 'packages/config'),
      '@errors': path.resolve(__dirname, 'packages/errors'),
      '@utils': path.resolve(__dirname, 'packages/utils'),
      '@shutdown': path.resolve(__dirname, 'packages/shutdown'),
    },
  },
});
