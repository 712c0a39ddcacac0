import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    exclude: ['node_modules', 'dist', '.git'],
    env: {
      LOG_LEVEL: 'silent',
    },
    // RSA key generation in certificate fixtures
    hookTimeout: 60_000,
    testTimeout: 30_000,
  },
});
