import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
    node: 'src/node.ts',
  },

  outDir: 'dist',

  format: ['esm'],

  dts: true,
  sourcemap: true,
  clean: true,

  treeshake: true,
  splitting: false,
});
