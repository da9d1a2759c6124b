import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      all: true,
      include: ['src/**/*.ts'],
      exclude: [
        'src/**/*.d.ts',
        'src/index.ts',
        'src/cli/buildstamp.ts'
      ],
      thresholds: {
        lines: 80,
        functions: 65,
        statements: 80,
        branches: 70
      },
      reportsDirectory: './coverage'
    }
  }
});
