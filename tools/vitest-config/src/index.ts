import type { UserConfig } from 'vitest/config';

export interface SharedConfigOptions {
  /**
   * Glob prefix of the source directories (default: 'src')
   */
  sourceDir?: string;
}

/**
 * Test settings shared by every workspace. Tests sit beside their sources
 * as `*.test.ts`.
 */
export const defineConfig = (
  options: UserConfig = {},
  { sourceDir = 'src' }: SharedConfigOptions = {},
): UserConfig => {
  return {
    ...options,
    test: {
      environment: 'node',
      globals: true,
      clearMocks: true,
      pool: 'threads',
      include: [`${sourceDir}/**/*.{test,spec}.ts`],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: [`${sourceDir}/**/*.ts`],
        exclude: ['**/*.test.ts', '**/index.ts', '**/types.ts'],
      },
      ...options.test,
    },
  };
};
