import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/main/main.ts'],
  outDir: 'dist/main',
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  sourcemap: true,
  clean: false,
  splitting: false
});
