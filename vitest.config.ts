import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const rootDir = dirname(fileURLToPath(import.meta.url));

function resolvePath(relativePath: string): string {
  return resolve(rootDir, relativePath);
}

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/**/*.test.ts', 'apps/**/*.test.ts'],
    coverage: {
      reporter: ['text', 'lcov'],
      reportsDirectory: 'coverage',
    },
  },
  resolve: {
    alias: {
      '@wa-relay/whatsapp-sdk': resolvePath('packages/whatsapp-sdk/src/index.ts'),
      '@wa-relay/backend-client': resolvePath('packages/backend-client/src/index.ts'),
    },
  },
});
