import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  // Bundle all @pulse/* workspace packages into the dist so the published
  // package is self-contained.
  noExternal: [/^@pulse\//],
});
