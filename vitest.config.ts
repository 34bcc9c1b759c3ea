import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', 'dist/', '**/*.test.ts', '**/*.spec.ts'],
    },
    // Keep pino on plain JSON so no transport worker is started under test
    env: {
      LOG_PRETTY: 'false',
      NODE_ENV: 'test',
      VITEST: 'true',
    },
  },
});
