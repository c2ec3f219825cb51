import { Effect } from 'effect'
import fg from 'fast-glob'
import path from 'node:path'
import { Project } from 'ts-morph'

import { DeriveIoError } from './errors.js'

export type ProjectFiles = {
  readonly repoRootAbs: string
  readonly filesAbs: ReadonlyArray<string>
  readonly project: Project
}

const normalizeAbsPath = (p: string): string => path.resolve(p)

export const DEFAULT_INCLUDE_GLOBS: ReadonlyArray<string> = ['**/*.ts', '**/*.tsx']

export const DEFAULT_EXCLUDE_GLOBS: ReadonlyArray<string> = [
  '**/node_modules/**',
  '**/dist/**',
  '**/build/**',
  '**/coverage/**',
  '**/*.d.ts',
]

export const buildProject = (args: {
  readonly repoRoot: string
  readonly outSuffix: string
  readonly tsconfig?: string
  readonly includeGlobs?: ReadonlyArray<string>
  readonly excludeGlobs?: ReadonlyArray<string>
}): Effect.Effect<ProjectFiles, DeriveIoError> =>
  Effect.gen(function* () {
    const repoRootAbs = normalizeAbsPath(args.repoRoot)
    const tsconfigAbs = args.tsconfig ? (path.isAbsolute(args.tsconfig) ? args.tsconfig : path.join(repoRootAbs, args.tsconfig)) : undefined

    const includeGlobs = Array.from(args.includeGlobs ?? DEFAULT_INCLUDE_GLOBS)
    // Companion modules are outputs; scanning them would derive from generated code.
    const excludeGlobs = [...(args.excludeGlobs ?? DEFAULT_EXCLUDE_GLOBS), `**/*${args.outSuffix}`]

    const filesAbs = yield* Effect.tryPromise({
      try: () =>
        fg(includeGlobs, {
          cwd: repoRootAbs,
          absolute: true,
          onlyFiles: true,
          ignore: excludeGlobs,
        }).then((xs) => xs.map((x) => normalizeAbsPath(x)).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))),
      catch: (cause) => new DeriveIoError({ path: repoRootAbs, operation: 'glob', cause }),
    })

    const project = new Project({
      useInMemoryFileSystem: false,
      skipAddingFilesFromTsConfig: true,
      ...(tsconfigAbs ? { tsConfigFilePath: tsconfigAbs } : null),
    })

    for (const fileAbs of filesAbs) {
      yield* Effect.try({
        try: () => project.addSourceFileAtPath(fileAbs),
        catch: (cause) => new DeriveIoError({ path: fileAbs, operation: 'read', cause }),
      })
    }

    return { repoRootAbs, filesAbs, project } satisfies ProjectFiles
  })
