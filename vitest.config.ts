import { defineConfig } from 'vitest/config';
import { tmpdir } from 'os';
import { join } from 'path';

// force vitest to use CI mode to avoid watch mode
process.env.CI = 'true';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    // error-level events are always written to <KEEPER_HOME>/logs
    env: {
      KEEPER_HOME: join(tmpdir(), 'credential-keeper-test'),
    },
    include: ['packages/*/src/**/*.test.ts'],
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: false,
        maxForks: 4,
      },
    },
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules/', '**/*.test.ts', '**/__tests__/**', '**/dist/*', '**/*.config.ts', '**/cli.ts'],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
