import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/bin.ts'],
  format: ['cjs', 'esm'],
  dts: true,
  sourcemap: true,
  clean: true,
  splitting: false,
  minify: false,
  // Mark node built-ins as external
  external: ['fs'],
  esbuildOptions(options) {
    options.platform = 'node';
  },
});
