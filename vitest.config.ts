import path from 'path'

import { defineConfig } from 'vitest/config'

const src = (dir: string) => path.resolve(__dirname, 'src', dir)

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    isolate: true,
    pool: 'threads',

    mockReset: true,
    clearMocks: true,
    restoreMocks: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/**',
        '**/*.test.ts',
        '**/*.config.ts',
        'tools/sky-check/cli.ts',
        'coverage/**',
        'dist/**',
      ],
      thresholds: {
        branches: 90,
        functions: 95,
        lines: 95,
        statements: 95,
      },
    },

    include: ['src/**/*.test.ts', 'tools/**/*.test.ts'],
  },
  resolve: {
    // Bare aliases are anchored so '$types' does not swallow '$types/errors'
    alias: [
      { find: /^@core\//, replacement: src('core') + '/' },
      { find: /^@logging$/, replacement: src('logging/index.ts') },
      { find: /^@logging\//, replacement: src('logging') + '/' },
      { find: /^@utils\//, replacement: src('utils') + '/' },
      { find: /^@validation$/, replacement: src('validation/index.ts') },
      { find: /^@validation\//, replacement: src('validation') + '/' },
      { find: /^@boot\//, replacement: src('boot') + '/' },
      { find: /^@system\//, replacement: src('system') + '/' },
      { find: /^\$types$/, replacement: src('types/index.ts') },
      { find: /^\$types\//, replacement: src('types') + '/' },
    ],
  },
})
