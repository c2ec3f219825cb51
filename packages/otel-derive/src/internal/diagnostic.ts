import type { DiagnosticCode, ReasonCode } from './reasonCodes.js'
import type { Range, Span } from './span.js'

/** A failure found by a pure stage, still expressed as a text range. */
export type Problem = {
  readonly code: DiagnosticCode
  readonly reasonCode: ReasonCode
  readonly message: string
  readonly range: Range
  readonly hint?: string
}

export type Diagnostic = {
  readonly code: DiagnosticCode
  readonly reasonCode: ReasonCode
  readonly message: string
  readonly file: string
  readonly span: Span
  readonly hint?: string
}

export type Checked<A> =
  | { readonly ok: true; readonly value: A }
  | { readonly ok: false; readonly problems: ReadonlyArray<Problem> }

export const succeed = <A>(value: A): Checked<A> => ({ ok: true, value })

export const fail = (...problems: ReadonlyArray<Problem>): Checked<never> => ({ ok: false, problems })

export const problem = (
  code: DiagnosticCode,
  reasonCode: ReasonCode,
  message: string,
  range: Range,
  hint?: string,
): Problem => ({ code, reasonCode, message, range, ...(hint ? { hint } : null) })
