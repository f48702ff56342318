import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['cli/index.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist/bundle',
  clean: true,
  sourcemap: true,
});
