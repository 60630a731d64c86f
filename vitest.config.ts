import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const r = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@api': r('./src/api'),
      '@config': r('./src/config'),
      '@core': r('./src/core'),
      '@infra': r('./src/infrastructure'),
      '@middleware': r('./src/middleware'),
      '@services': r('./src/services'),
      '@test': r('./src/test'),
      '@utils': r('./src/utils'),
    },
  },
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    setupFiles: ['src/test/setupEnv.ts'],
  },
});
