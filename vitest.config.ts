import { defineConfig } from 'vitest/config';
import path from 'node:path';

export default defineConfig({
  resolve: {
    alias: {
      '@main': path.resolve(__dirname, 'src/main'),
      '@shared': path.resolve(__dirname, 'src/shared')
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
        'src/main/services/download/**/*.ts',
        'src/main/services/handoff/**/*.ts',
        'src/main/services/install/**/*.ts',
        'src/main/services/orchestrator/**/*.ts',
        'src/main/services/releases/**/*.ts',
        'src/main/services/state/**/*.ts',
        'src/main/services/upgrade/**/*.ts',
        'src/main/cli/**/*.ts'
      ],
      thresholds: {
        perFile: true,
        lines: 60,
        statements: 60,
        functions: 80,
        branches: 55
      }
    }
  }
});
