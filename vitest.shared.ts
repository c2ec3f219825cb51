import path from 'node:path'
import { fileURLToPath } from 'node:url'

import { jsToTsResolver } from './scripts/vite-js-to-ts-resolver.js'

const rootDir = path.dirname(fileURLToPath(import.meta.url))

export const sharedConfig = {
  plugins: [jsToTsResolver()],
  resolve: {
    alias: {
      // Generated companion modules written to temp repos import the model by name.
      '@otel-derive/model': path.resolve(rootDir, './packages/otel-model/src/index.ts'),
      '@otel-derive/engine': path.resolve(rootDir, './packages/otel-derive/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    exclude: ['**/node_modules/**', '**/dist/**', '**/fixtures/**'],
    // ts-morph projects over fixture repos can outlast the default 5s.
    testTimeout: 20000,
  },
}
