import { formatDiagnostic } from './format.js'
import type { Diagnostic } from './diagnostic.js'

const summarizeCause = (cause: unknown): { name?: string; message?: string } => {
  if (cause instanceof Error) {
    return { name: cause.name, message: cause.message }
  }
  return { message: typeof cause === 'string' ? cause : undefined }
}

export type DeriveErrorTag = 'DeriveError' | 'DeriveIoError'

abstract class DeriveErrorBase extends Error {
  abstract readonly _tag: DeriveErrorTag
  readonly hint?: string

  protected constructor(params: { readonly message: string; readonly hint?: string }) {
    super(params.message)
    this.hint = params.hint
  }

  toJSON(): Record<string, unknown> {
    return {
      _tag: this._tag,
      name: this.name,
      message: this.message,
      hint: this.hint,
    }
  }
}

/** Annotations that cannot be derived. Nothing was generated. */
export class DeriveError extends DeriveErrorBase {
  readonly _tag = 'DeriveError' as const
  readonly diagnostics: ReadonlyArray<Diagnostic>

  constructor(diagnostics: ReadonlyArray<Diagnostic>) {
    const first = diagnostics[0]
    super({
      message:
        diagnostics.length === 1 && first
          ? `[otel-derive] ${formatDiagnostic(first)}`
          : `[otel-derive] ${diagnostics.length} problems in annotations:\n${diagnostics.map(formatDiagnostic).join('\n')}`,
    })
    this.name = 'DeriveError'
    this.diagnostics = diagnostics
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), diagnostics: this.diagnostics }
  }
}

export class DeriveIoError extends DeriveErrorBase {
  readonly _tag = 'DeriveIoError' as const
  readonly path: string
  readonly operation: 'glob' | 'read' | 'write'
  override readonly cause?: { readonly name?: string; readonly message?: string }

  constructor(params: { readonly path: string; readonly operation: 'glob' | 'read' | 'write'; readonly cause: unknown }) {
    super({
      message: `[otel-derive] failed to ${params.operation} ${params.path}`,
      hint: params.operation === 'write' ? 'check that the directory is writable' : undefined,
    })
    this.name = 'DeriveIoError'
    this.path = params.path
    this.operation = params.operation
    this.cause = summarizeCause(params.cause)
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), path: this.path, operation: this.operation, cause: this.cause }
  }
}
