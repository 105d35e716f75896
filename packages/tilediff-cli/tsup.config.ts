import { defineConfig } from 'tsup';

export default defineConfig({
  entry: ['src/index.ts', 'src/cli/index.ts'],
  format: ['esm'],
  dts: false,
  clean: true,
  outDir: 'dist',
  shims: false,
  platform: 'node',
  // Bundle workspace packages so the published CLI stands alone
  noExternal: ['@tilediff/core', '@tilediff/shared-logging'],
  external: ['pngjs', 'pino', 'pino-pretty', 'zod'],
  banner: {
    js: '#!/usr/bin/env node',
  },
});
