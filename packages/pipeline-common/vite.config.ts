import { builtinModules } from 'node:module'
import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'

const builtins = [...builtinModules, ...builtinModules.map((moduleName) => `node:${moduleName}`)]

export default defineConfig({
  build: {
    target: 'node20',
    lib: {
      entry: 'src/index.ts',
      formats: ['es'],
      fileName: 'index',
    },
    rollupOptions: {
      external: [...builtins, 'picocolors'],
    },
    sourcemap: true,
  },
  plugins: [dts({ outDir: './dist', entryRoot: 'src', exclude: ['src/**/*.test.ts'] })],
})
