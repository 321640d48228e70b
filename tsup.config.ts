import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['bin/bench-ci.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
});
