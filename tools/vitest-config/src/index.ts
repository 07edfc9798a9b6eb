import type { UserConfig } from 'vitest/config';

/**
 * Shared Vitest settings for every workspace package.
 *
 * Package-level `test` options are layered over the base; coverage
 * exclusions are appended rather than replaced.
 */
export const defineConfig = (options: UserConfig = {}): UserConfig => {
  const { test, ...rest } = options;
  const { coverage, ...testRest } = test ?? {};
  const extraExcludes =
    coverage && 'exclude' in coverage && coverage.exclude
      ? coverage.exclude
      : [];

  return {
    ...rest,
    test: {
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      pool: 'threads',
      include: ['src/**/*.{test,spec}.ts'],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: ['src/**/*.ts'],
        exclude: ['**/index.ts', '**/*.test.ts', ...extraExcludes],
        thresholds: {
          lines: 90,
          functions: 90,
          branches: 85,
          statements: 90,
        },
      },
      ...testRest,
    },
  };
};
