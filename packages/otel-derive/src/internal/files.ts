import { createHash } from 'node:crypto'
import path from 'node:path'

const SOURCE_EXTENSION = /\.tsx?$/

/** Repo-relative, `/`-separated. */
export const normalizeFilePath = (repoRootAbs: string, fileAbs: string): string =>
  path.relative(repoRootAbs, fileAbs).split(path.sep).join('/')

/** `src/request.ts` → `src/request.otel.ts` for the default suffix. */
export const companionPathOf = (file: string, outSuffix: string): string => file.replace(SOURCE_EXTENSION, outSuffix)

/** How a companion module imports the file it was generated from: `./request.js`. */
export const sourceSpecifierOf = (file: string): string => `./${path.posix.basename(file).replace(SOURCE_EXTENSION, '.js')}`

export const digestOfText = (text: string): string => createHash('sha256').update(text, 'utf8').digest('hex')

const compare = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0)

export const sortByLocation = <T extends { readonly file: string; readonly span: { readonly start: { readonly offset: number } } }>(
  items: ReadonlyArray<T>,
): ReadonlyArray<T> => Array.from(items).sort((x, y) => compare(x.file, y.file) || x.span.start.offset - y.span.start.offset)
