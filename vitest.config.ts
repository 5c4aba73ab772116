import { defineConfig } from 'vitest/config'

/**
 * Vitest configuration - pdf-info-editor
 *
 * Tests that replace files in temp directories run one file at a time.
 */

export default defineConfig({
  test: {
    globals: false,
    environment: 'node',

    include: ['src/**/*.{test,spec}.ts'],

    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/coverage/**',
      '**/.{git,cache,output,temp}/**',
    ],

    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
    },

    pool: 'forks',
    poolOptions: {
      forks: {
        maxForks: 1,
        minForks: 1,
      },
    },

    fileParallelism: false,

    testTimeout: 30000,
    hookTimeout: 30000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/__tests__/**',
        '**/*.d.ts',
        '**/*.config.*',
        '**/coverage/**'
      ]
    }
  }
})
