import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    cli: 'src/cli.ts',
    index: 'src/index.ts',
  },
  format: ['esm'],
  target: 'node20',
  // Only the library entry needs declarations.
  dts: { entry: { index: 'src/index.ts' } },
  clean: true,
  sourcemap: true,
});
