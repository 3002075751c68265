import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@main': fileURLToPath(new URL('./src/main', import.meta.url)),
      '@shared': fileURLToPath(new URL('./src/shared', import.meta.url))
    }
  },
  test: {
    environment: 'node',
    globals: true,
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      all: true,
      reporter: ['text', 'json-summary', 'lcov'],
      include: [
        'src/main/services/config/**/*.ts',
        'src/main/services/environment/app-paths.ts',
        'src/main/services/logging/Logger.ts',
        'src/main/services/update/**/*.ts'
      ],
      thresholds: {
        perFile: true,
        lines: 60,
        statements: 60,
        functions: 90,
        branches: 55
      }
    }
  }
});
