/// <reference types="vitest" />
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    include: ['packages/*/tests/**/*.spec.ts', 'apps/*/tests/**/*.spec.ts'],
    // Quiet down noisy logs during tests
    env: { LOG_LEVEL: 'silent', NODE_ENV: 'test' },
    reporters: 'default',
  },
  resolve: {
    conditions: ['node', 'default'],
  },
});
