import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    // Main entry point (everything)
    index: 'src/index.ts',

    // =========================================================================
    // Granular entry points
    // =========================================================================
    ratelimit: 'src/ratelimit-entry.ts',
    errors: 'src/errors-entry.ts',
    retry: 'src/retry-entry.ts',

    // =========================================================================
    // Tools
    // =========================================================================
    testing: 'src/testing-entry.ts',
  },
  format: ['cjs', 'esm'],
  dts: true,
  clean: true,
  splitting: false,
  sourcemap: true,
  minify: true,
});
