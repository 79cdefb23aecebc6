/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node', // backend service
    globals: true,
    reporters: 'default',
    include: ['src/tests/**/*.spec.ts'],
    testTimeout: 10_000,
    env: {
      LOG_LEVEL: 'error',
    },
  },
  esbuild: { target: 'es2022' },
});
