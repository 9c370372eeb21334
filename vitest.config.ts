import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

function packageEntry(name: string): string {
  return fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));
}

export default defineConfig({
  resolve: {
    alias: {
      // Keep tests independent from prebuilt package artifacts in clean checkouts.
      '@flowpilot/db': packageEntry('db'),
      '@flowpilot/shared': packageEntry('shared'),
      '@flowpilot/core': packageEntry('core'),
      '@flowpilot/agents': packageEntry('agents'),
    },
  },
  test: {
    include: ['packages/**/src/**/*.test.ts'],
    exclude: ['**/dist/**', '**/node_modules/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/test-support.ts', '**/dist/**', '**/node_modules/**'],
    },
  },
});
