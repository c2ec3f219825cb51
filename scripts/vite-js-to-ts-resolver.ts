import fs from 'node:fs'
import path from 'node:path'
import type { Plugin } from 'vite'

const stripQuery = (id: string): string => id.split('?', 1)[0] ?? id

/**
 * Sources import their siblings as `./x.js` (Node ESM style); Vite does not
 * fall back from an explicit `.js` to the `.ts` file beside it, so this does.
 */
export const jsToTsResolver = (): Plugin => ({
  name: 'otel-derive:js-to-ts-resolver',
  enforce: 'pre',
  resolveId(source, importer) {
    if (!importer || !source.startsWith('.') || !source.endsWith('.js')) {
      return null
    }

    const resolvedJs = path.resolve(path.dirname(stripQuery(importer)), stripQuery(source))
    if (fs.existsSync(resolvedJs)) {
      return null
    }

    const base = resolvedJs.slice(0, -'.js'.length)
    for (const candidate of [`${base}.ts`, `${base}.tsx`, `${base}.mts`]) {
      if (fs.existsSync(candidate)) {
        return candidate
      }
    }

    return null
  },
})
