import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'], // single entrypoint to keep one copy of the dialect registry
  format: ['esm', 'cjs'],
  target: 'node20',
  dts: true,
  splitting: false,
  sourcemap: true,
  clean: true
});
