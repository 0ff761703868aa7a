import { defineConfig, coverageConfigDefaults } from 'vitest/config'
import { resolve, dirname } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))
const isCI = process.env.CI === 'true'

export default defineConfig({
  resolve: {
    alias: [
      { find: '@pumplog/events/testing', replacement: resolve(__dirname, 'packages/events/src/testing/fixtures.ts') },
      { find: '@pumplog/events', replacement: resolve(__dirname, 'packages/events/src/index.ts') },
    ],
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    coverage: {
      provider: 'v8',
      reporter: isCI ? ['text', 'json', 'lcov'] : ['text', 'html'],
      reportsDirectory: './coverage',

      include: ['packages/events/src/**/*.ts', 'packages/cli/src/**/*.ts'],

      exclude: [
        ...coverageConfigDefaults.exclude,
        '**/*.test.ts',
        '**/testing/**',
        '**/*.d.ts',
        '**/index.ts',
        // commander wiring only
        'packages/cli/src/cli.ts',
      ],

      thresholds: {
        lines: 80,
        branches: 70,
        functions: 80,
        statements: 80,
      },
    },
  },
})
