import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const pkg = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@switchyard/core': pkg('core'),
      '@switchyard/store': pkg('store'),
      '@switchyard/proxy': pkg('proxy'),
      '@switchyard/disposable': pkg('disposable'),
      '@switchyard/fallback': pkg('fallback'),
    },
  },
  test: {
    environment: 'node',
    env: { SWITCHYARD_LOG_LEVEL: 'silent' },
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', 'test/', '**/*.test.ts', '**/*.d.ts'],
    },
    testTimeout: 30000,
    hookTimeout: 30000,
    projects: [
      {
        extends: true,
        test: {
          name: 'unit',
          include: ['test/unit/**/*.test.ts'],
        },
      },
      {
        extends: true,
        test: {
          name: 'integration',
          include: ['test/integration/**/*.test.ts'],
        },
      },
    ],
  },
});
