import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/main.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  splitting: false,
  sourcemap: true,
  clean: true,
  outDir: 'dist',
  // Bundle the workspace core; keep npm packages external
  noExternal: ['@playdeck/core'],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
