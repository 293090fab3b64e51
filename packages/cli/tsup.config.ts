import { defineConfig } from 'tsup'

export default defineConfig({
  entry: ['src/bin.ts'],
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  sourcemap: true,
  clean: true,
  // the library ships TypeScript sources, so it is bundled into the binary
  noExternal: ['sealpost'],
  banner: {
    js: '#!/usr/bin/env node',
  },
})
