import { defineConfig } from 'tsup';

export default defineConfig({
  entry: { cli: 'apps/cli/src/main.ts' },
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  outDir: 'dist',
  dts: false,
  banner: { js: '#!/usr/bin/env node' },
  // Workspace packages are bundled in; runtime deps stay external and are
  // listed in package.json dependencies.
  noExternal: [/^@portshift\//],
  external: ['@kubernetes/client-node', 'commander'],
});
