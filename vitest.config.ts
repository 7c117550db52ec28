import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const workspacePackages = ['utils', 'core', 'media', 'processing', 'sync', 'report'];

export default defineConfig({
  resolve: {
    alias: Object.fromEntries(
      workspacePackages.map((name) => [
        `@transcode-mirror/${name}`,
        fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url)),
      ])
    ),
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
      NODE_ENV: 'test',
    },
    testTimeout: 15000,
  },
});
