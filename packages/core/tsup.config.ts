import { defineConfig } from 'tsup';

export default defineConfig({
  entry: [
    'src/index.ts',   // @catalog-submissions/core - interfaces + types
    'src/memory.ts',  // @catalog-submissions/core/memory - in-memory implementations
    'src/github.ts',  // @catalog-submissions/core/github - GitHub API implementations
  ],
  format: ['cjs'],
  dts: true,
  sourcemap: true,
  clean: true,
  outDir: 'dist/src',
  splitting: false,
  treeshake: true,
});
