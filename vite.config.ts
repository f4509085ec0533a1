import { defineConfig } from 'vite'
import dts from 'vite-plugin-dts'

export default defineConfig({
  plugins: [
    dts({
      include: ['src/**/*'],
      exclude: ['src/**/*.test.ts', 'src/**/*.spec.ts']
    })
  ],
  build: {
    target: 'node20',
    lib: {
      entry: {
        index: 'src/index.ts',
        cli: 'src/cli.ts'
      },
      fileName: (_format, entryName) => `${entryName}.js`,
      formats: ['es']
    },
    rollupOptions: {
      external: [/^node:/, 'json5']
    }
  }
})
