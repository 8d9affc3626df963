import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  outDir: 'dist',
  format: ['esm'],
  dts: true,
  clean: true,
  splitting: false,
  treeshake: true,
  sourcemap: false,
  target: 'es2022',
  // Field names are read from `provider.name`; keep function names intact.
  esbuildOptions(options) {
    options.keepNames = true;
  }
});
