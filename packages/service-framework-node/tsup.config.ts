import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/sf.ts', 'src/typebox.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  sourcemap: true,
  dts: true,
});
