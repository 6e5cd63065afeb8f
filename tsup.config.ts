import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['bin/blame-compare.ts', 'src/index.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  splitting: false,
  sourcemap: true,
  dts: true,
});
