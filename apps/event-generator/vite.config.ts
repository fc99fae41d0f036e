import { builtinModules } from 'node:module'
import { defineConfig } from 'vite'

const builtins = [...builtinModules, ...builtinModules.map((moduleName) => `node:${moduleName}`)]

const externals = Array.from(new Set([...builtins, '@grpc/grpc-js', 'zod']))

export default defineConfig({
  build: {
    target: 'node20',
    lib: {
      entry: 'src/event-generator.ts',
      formats: ['es'],
      fileName: 'event-generator',
    },
    rollupOptions: {
      external: externals,
    },
  },
})
