import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'
import dts from 'vite-plugin-dts'
import path from 'node:path'

let root = path.dirname(fileURLToPath(import.meta.url))

/**
 * Check if a module is external.
 *
 * @param id - The module ID.
 * @returns True if the module is external, false otherwise.
 */
function external(id: string): boolean {
  return !id.startsWith('.') && !path.isAbsolute(id)
}

/** Vite configuration: library build plus the test runner. */
export default defineConfig({
  build: {
    rollupOptions: {
      output: {
        chunkFileNames: '[name]-[hash].js',
        entryFileNames: '[name].js',
        preserveModules: true,
        exports: 'auto',
      },
      external,
    },
    lib: {
      entry: [
        path.resolve(root, 'cli/index.ts'),
        path.resolve(root, 'core/index.ts'),
      ],
      formats: ['es'],
    },
    minify: true,
  },
  plugins: [
    dts({
      include: [
        path.resolve(root, 'cli'),
        path.resolve(root, 'core'),
        path.resolve(root, 'types'),
      ],
      insertTypesEntry: true,
      copyDtsFiles: true,
      strictOutput: true,
    }),
  ],
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
  },
})
