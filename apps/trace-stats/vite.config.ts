import { builtinModules } from 'node:module'
import { defineConfig } from 'vite'

const builtins = [...builtinModules, ...builtinModules.map((moduleName) => `node:${moduleName}`)]

const externals = Array.from(new Set([...builtins, 'fast-xml-parser', 'picocolors']))

export default defineConfig({
  build: {
    target: 'node20',
    ssr: 'src/trace-stats.ts',
    outDir: 'dist',
    emptyOutDir: true,
    rollupOptions: {
      external: externals,
      output: {
        entryFileNames: 'trace-stats.js',
        banner: '#!/usr/bin/env node',
      },
    },
  },
})
