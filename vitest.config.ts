import path from 'node:path';

import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@observatory/shared': path.resolve(__dirname, 'packages/shared/src/index.ts')
    }
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: [path.resolve(__dirname, 'tests/setup/setupEnv.ts')],
    minWorkers: 1,
    maxWorkers: 1,
    isolate: true,
    testTimeout: 30_000,
    reporters: 'default'
  }
});
