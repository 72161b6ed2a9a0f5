import { defineConfig } from 'tsup';

// Bundles the workspace packages (which export TypeScript sources) into one
// ESM entry; npm dependencies stay external.
export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  outDir: 'dist',
  clean: true,
  splitting: false,
  treeshake: true,
  noExternal: [/^@ratewise\//],
});
