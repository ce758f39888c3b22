import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    'cli/index': 'src/cli/index.ts',
  },
  format: ['esm'],
  target: 'node20',
  clean: true,
  outDir: 'dist',
  // Keep runtime dependencies out of the bundle
  external: [
    'axios',
    'chalk',
    'commander',
    'dotenv',
    'js-yaml',
  ],
  shims: false,
  dts: true, // Generate declaration files
  splitting: true,
  sourcemap: true,
  // Post-build hook to make the CLI executable
  onSuccess: 'chmod +x dist/cli/index.js',
});
