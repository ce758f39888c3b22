import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
  test: {
    // Test environment
    environment: 'node',

    // Test file patterns
    include: [
      'src/**/*.{test,spec}.ts',
      'test/**/*.{test,spec}.ts'
    ],
    exclude: [
      'node_modules',
      'dist',
      '.git',
      '.cache'
    ],

    // Coverage configuration
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        'test/',
        '**/*.d.ts',
        '**/*.config.ts',
        'src/cli/index.ts' // CLI entry point
      ]
    },

    globals: true,

    // Timeout settings
    testTimeout: 10000,
    hookTimeout: 10000,

    // Mock handling
    mockReset: true,
    clearMocks: true,
    restoreMocks: true,

    // Setup files
    setupFiles: ['./test/setup.ts']
  },

  // Path resolution to match tsconfig.json
  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url))
    }
  },

  define: {
    'process.env.NODE_ENV': '"test"'
  }
});
