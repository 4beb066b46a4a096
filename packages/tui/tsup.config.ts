import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts'],
  format: ['esm'],
  target: 'node20',
  platform: 'node',
  outDir: 'dist',
  clean: true,
  sourcemap: true,
  splitting: false,
  noExternal: ['@jellyfzf/core', '@jellyfzf/shared'],
  banner: {
    js: '#!/usr/bin/env node'
  }
});
