import { defineConfig } from 'tsup'

// Publishable CJS + ESM bundles; `npm run build` emits the plain tsc output.
export default defineConfig({
  entry: ['src/index.ts', 'src/adapter/astexplorer.ts'],
  outDir: 'bundle',
  format: ['cjs', 'esm'],
  dts: true,
  sourcemap: true,
  clean: true,
})
