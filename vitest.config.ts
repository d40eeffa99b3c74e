import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    setupFiles: ['tests/setup.ts'],
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts', 'server/src/**/*.ts'],
      exclude: ['src/**/index.ts', 'server/src/index.ts'],
    },
    alias: {
      '@shared': fileURLToPath(new URL('./src/shared', import.meta.url)),
      '@vibe': fileURLToPath(new URL('./src/vibe', import.meta.url)),
      '@presentation': fileURLToPath(new URL('./src/presentation', import.meta.url)),
    },
  },
});
