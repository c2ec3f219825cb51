import fs from 'node:fs/promises'
import path from 'node:path'

import { Effect, type ConfigError } from 'effect'
import { Project } from 'ts-morph'

import { DEFAULT_DERIVE_CONFIG, DeriveConfig } from './DeriveConfig.js'
import { deriveFile, type DeriveFileResult, type DerivedModule } from './internal/deriveFile.js'
import type { Diagnostic } from './internal/diagnostic.js'
import { DeriveError, DeriveIoError } from './internal/errors.js'
import { digestOfText, normalizeFilePath, sortByLocation } from './internal/files.js'
import { formatDiagnostic } from './internal/format.js'
import { buildProject } from './internal/project.js'

export type { DeriveFileResult, DerivedModule } from './internal/deriveFile.js'

export type DeriveMode = 'report' | 'write'

export type DeriveSourceArgs = {
  readonly fileName: string
  readonly text: string
  readonly modelModule?: string
  readonly outSuffix?: string
}

/**
 * Derives the companion module of a single in-memory source file. Pure and
 * synchronous; reads nothing from disk or the environment.
 */
export const deriveSource = (args: DeriveSourceArgs): DeriveFileResult => {
  const project = new Project({ useInMemoryFileSystem: true })
  const sourceFile = project.createSourceFile(args.fileName, args.text, { overwrite: true })
  return deriveFile({
    sourceFile,
    file: args.fileName,
    modelModule: args.modelModule ?? DEFAULT_DERIVE_CONFIG.modelModule,
    outSuffix: args.outSuffix ?? DEFAULT_DERIVE_CONFIG.outSuffix,
  })
}

export type CompanionDecision = 'create' | 'update' | 'unchanged'

export type CompanionModuleV1 = {
  readonly file: string
  readonly outFile: string
  readonly typeNames: ReadonlyArray<string>
  readonly conversionsTotal: number
  readonly digest: string
  readonly decision: CompanionDecision
}

export type DeriveResultV1 = {
  readonly schemaVersion: 1
  readonly kind: 'DeriveResult'
  readonly mode: DeriveMode
  readonly repoRoot: string
  readonly modules: ReadonlyArray<CompanionModuleV1>
  /** Companion modules written by this run; always empty in `report` mode. */
  readonly writtenFiles: ReadonlyArray<string>
  readonly summary: {
    readonly filesScanned: number
    readonly modulesTotal: number
    readonly conversionsTotal: number
    readonly createdTotal: number
    readonly updatedTotal: number
    readonly unchangedTotal: number
  }
}

export type DeriveProjectArgs = {
  readonly repoRoot: string
  readonly mode: DeriveMode
  readonly tsconfig?: string
  readonly includeGlobs?: ReadonlyArray<string>
  readonly excludeGlobs?: ReadonlyArray<string>
}

const isMissingFile = (cause: unknown): boolean =>
  typeof cause === 'object' && cause !== null && 'code' in cause && cause.code === 'ENOENT'

const readExisting = (absPath: string): Effect.Effect<string | undefined, DeriveIoError> =>
  Effect.tryPromise({
    try: async () => {
      try {
        return await fs.readFile(absPath, 'utf8')
      } catch (cause) {
        if (isMissingFile(cause)) return undefined
        throw cause
      }
    },
    catch: (cause) => new DeriveIoError({ path: absPath, operation: 'read', cause }),
  })

const planModule = (repoRootAbs: string, module: DerivedModule): Effect.Effect<CompanionModuleV1, DeriveIoError> =>
  Effect.gen(function* () {
    const digest = digestOfText(module.text)
    const existing = yield* readExisting(path.join(repoRootAbs, module.outFile))
    const decision: CompanionDecision =
      existing === undefined ? 'create' : digestOfText(existing) === digest ? 'unchanged' : 'update'
    return {
      file: module.file,
      outFile: module.outFile,
      typeNames: module.typeNames,
      conversionsTotal: module.conversions.length,
      digest,
      decision,
    }
  })

/**
 * Derives every annotated type under `repoRoot`. Any diagnostic fails the run
 * with a `DeriveError` before anything is written. In `write` mode companion
 * modules whose content changed are written; `report` mode only plans.
 */
export const deriveProject = (
  args: DeriveProjectArgs,
): Effect.Effect<DeriveResultV1, DeriveError | DeriveIoError | ConfigError.ConfigError> =>
  Effect.gen(function* () {
    const config = yield* DeriveConfig.resolve()
    const { repoRootAbs, filesAbs, project } = yield* buildProject({ ...args, outSuffix: config.outSuffix })
    yield* Effect.logDebug(`[otel-derive] scanning ${filesAbs.length} files (model=${config.modelModule}, config=${config.source})`)

    const modules: DerivedModule[] = []
    const diagnostics: Diagnostic[] = []

    for (const sourceFile of project.getSourceFiles()) {
      const file = normalizeFilePath(repoRootAbs, sourceFile.getFilePath().toString())
      const result = deriveFile({ sourceFile, file, modelModule: config.modelModule, outSuffix: config.outSuffix })
      if (!result.ok) {
        diagnostics.push(...result.diagnostics)
        continue
      }
      if (result.module) {
        modules.push(result.module)
        yield* Effect.logDebug(`[otel-derive] ${file}: ${result.module.conversions.length} conversions`)
      }
    }

    if (diagnostics.length > 0) {
      const sorted = sortByLocation(diagnostics)
      for (const d of sorted) {
        yield* Effect.logWarning(formatDiagnostic(d))
      }
      return yield* Effect.fail(new DeriveError(sorted))
    }

    modules.sort((a, b) => (a.file < b.file ? -1 : a.file > b.file ? 1 : 0))

    const planned: CompanionModuleV1[] = []
    for (const module of modules) {
      planned.push(yield* planModule(repoRootAbs, module))
    }

    const writtenFiles: string[] = []
    if (args.mode === 'write') {
      for (const [i, entry] of planned.entries()) {
        const module = modules[i]
        if (!module || entry.decision === 'unchanged') continue
        const absPath = path.join(repoRootAbs, entry.outFile)
        yield* Effect.tryPromise({
          try: () => fs.writeFile(absPath, module.text, 'utf8'),
          catch: (cause) => new DeriveIoError({ path: absPath, operation: 'write', cause }),
        })
        writtenFiles.push(entry.outFile)
      }
    }

    const count = (decision: CompanionDecision): number => planned.filter((m) => m.decision === decision).length

    const result: DeriveResultV1 = {
      schemaVersion: 1,
      kind: 'DeriveResult',
      mode: args.mode,
      repoRoot: repoRootAbs,
      modules: planned,
      writtenFiles,
      summary: {
        filesScanned: filesAbs.length,
        modulesTotal: planned.length,
        conversionsTotal: planned.reduce((n, m) => n + m.conversionsTotal, 0),
        createdTotal: count('create'),
        updatedTotal: count('update'),
        unchangedTotal: count('unchanged'),
      },
    }

    yield* Effect.logInfo(
      `[otel-derive] ${result.summary.modulesTotal} modules, ${result.summary.conversionsTotal} conversions, ${writtenFiles.length} written (${args.mode})`,
    )

    return result
  }).pipe(Effect.annotateLogs({ repoRoot: args.repoRoot }))
