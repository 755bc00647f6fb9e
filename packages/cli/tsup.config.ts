import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['cjs'],
  sourcemap: true,
  clean: true,
  outDir: 'dist',
  splitting: false,
  // core ships TypeScript sources, so it is compiled into the CLI bundle
  noExternal: ['@catalog-submissions/core'],
});
